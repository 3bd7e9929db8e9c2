import type { RecordStore } from '../moderation/recordStore.js';
import type { AggregateReport, CommentRecord, OffensiveComment } from '../types/index.js';
import { stringifyValue } from '../utils/text.js';

export const UNSPECIFIED_TYPE = 'unspecified';
export const TOP_OFFENSIVE_LIMIT = 5;

/** Only a boolean `true` counts; CSV-sourced strings such as "true" do not. */
export function isOffensive(record: CommentRecord): boolean {
  return record.is_offensive === true;
}

export function offenseTypeOf(record: CommentRecord): string {
  const type = stringifyValue(record.offense_type).trim();
  return type.length > 0 ? type : UNSPECIFIED_TYPE;
}

export function buildReport(store: RecordStore, topLimit: number = TOP_OFFENSIVE_LIMIT): AggregateReport {
  const offensive = store.all().filter(isOffensive);

  const typeCounts = new Map<string, number>();
  for (const record of offensive) {
    const type = offenseTypeOf(record);
    typeCounts.set(type, (typeCounts.get(type) ?? 0) + 1);
  }

  // Array.prototype.sort is stable, so equal lengths keep store order
  const topOffensive = offensive
    .map(toOffensiveComment)
    .sort((a, b) => b.explanation.length - a.explanation.length)
    .slice(0, topLimit);

  return {
    total: store.size,
    offensive: offensive.length,
    typeCounts,
    topOffensive,
  };
}

function toOffensiveComment(record: CommentRecord): OffensiveComment {
  return {
    commentId: stringifyValue(record.comment_id),
    text: stringifyValue(record.comment_text),
    offenseType: offenseTypeOf(record),
    explanation: stringifyValue(record.explanation),
  };
}
