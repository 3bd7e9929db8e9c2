import type { CommentRecord } from '../types/index.js';
import { stringifyValue } from '../utils/text.js';

export function buildModerationPrompt(batch: readonly CommentRecord[]): string {
  const header = [
    'You are a content moderation AI.',
    'For each of the following comments, return a JSON list with:',
    '- comment_id',
    '- is_offensive (true/false)',
    '- offense_type',
    '- explanation',
    '',
    'Comments:',
  ].join('\n');

  const lines = batch.map(
    (record, index) =>
      `${index + 1}. [comment_id: ${stringifyValue(record.comment_id)}] "${stringifyValue(record.comment_text)}"`,
  );

  return `${header}\n${lines.join('\n')}\n\nOnly return the JSON list. No markdown or explanation.`;
}
