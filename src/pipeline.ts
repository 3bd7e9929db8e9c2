import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CommentClassifier } from './clients/chatClassifier.js';
import type { ModerationConfig } from './config.js';
import { exportModeratedCsv } from './csv/writer.js';
import { loadComments } from './input/loader.js';
import { BatchModerator } from './moderation/batchModerator.js';
import { RecordStore } from './moderation/recordStore.js';
import { buildReport } from './report/aggregate.js';
import { renderPieChart } from './report/pieChart.js';
import { renderReportText } from './report/text.js';
import type { AggregateReport, ModerationRun } from './types/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import type { Sleep } from './utils/sleep.js';
import { collapseWhitespace, stringifyValue, truncate } from './utils/text.js';

export const OUTPUT_FILES = {
  csv: 'moderated_comments.csv',
  report: 'moderation_report.txt',
  chart: 'offense_type_pie_chart.png',
} as const;

export interface PipelineOptions {
  inputFile: string;
  outputDir: string;
  config: Pick<ModerationConfig, 'batchSize' | 'interBatchDelayMs'>;
  classifier: CommentClassifier;
  logger?: Logger;
  moderatorLogger?: Logger;
  sleep?: Sleep;
  /** Replaces the PNG renderer; tests use it to avoid the native canvas. */
  renderChart?: (counts: ReadonlyMap<string, number>) => Promise<Buffer>;
}

export interface PipelineResult {
  run: ModerationRun;
  report: AggregateReport;
  rowsWritten: number;
  csvPath: string;
  reportPath: string;
  chartPath: string | null;
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const logger = options.logger ?? createLogger('moderate');
  const comments = await loadComments(options.inputFile);
  if (comments.length === 0) {
    throw new Error(`No comments found in ${options.inputFile}.`);
  }

  logger(`Total comments: ${comments.length}`);
  logger(`Sample comment: ${truncate(collapseWhitespace(stringifyValue(comments[0]?.comment_text)), 200)}`);

  const store = RecordStore.from(comments);
  const moderator = new BatchModerator(options.classifier, options.config, {
    logger: options.moderatorLogger ?? createLogger('batch'),
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });
  const run = await moderator.run(store);

  await fs.mkdir(options.outputDir, { recursive: true });

  const csvPath = path.join(options.outputDir, OUTPUT_FILES.csv);
  const rowsWritten = await exportModeratedCsv(csvPath, store);
  logger(`Wrote ${rowsWritten} rows to ${csvPath}`);

  const report = buildReport(store);
  const reportPath = path.join(options.outputDir, OUTPUT_FILES.report);
  await fs.writeFile(reportPath, renderReportText(report), 'utf8');
  logger(`Report saved to ${reportPath}`);

  let chartPath: string | null = null;
  if (report.typeCounts.size > 0) {
    chartPath = path.join(options.outputDir, OUTPUT_FILES.chart);
    const png = await (options.renderChart ?? renderPieChart)(report.typeCounts);
    await fs.writeFile(chartPath, png);
    logger(`Pie chart saved as ${chartPath}`);
  } else {
    logger('No offensive comments - skipping pie chart.');
  }

  return { run, report, rowsWritten, csvPath, reportPath, chartPath };
}
