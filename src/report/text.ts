import type { AggregateReport } from '../types/index.js';
import { TOP_OFFENSIVE_LIMIT } from './aggregate.js';

export function renderReportText(report: AggregateReport): string {
  const lines = [
    '=== Moderation Report ===',
    '',
    `Total Comments: ${report.total}`,
    `Offensive Comments: ${report.offensive}`,
    '',
    'Offense Type Breakdown:',
  ];

  for (const [type, count] of report.typeCounts) {
    lines.push(`  - ${type}: ${count}`);
  }

  lines.push('', `Top ${TOP_OFFENSIVE_LIMIT} Most Offensive Comments:`);
  report.topOffensive.forEach((comment, index) => {
    lines.push(
      `${index + 1}. ${comment.text}`,
      `   → Type: ${comment.offenseType}`,
      `   → Explanation: ${comment.explanation}`,
      '',
    );
  });

  return `${lines.join('\n')}\n`;
}
