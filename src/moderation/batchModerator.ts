import { describeError, type CommentClassifier } from '../clients/chatClassifier.js';
import type { ModerationConfig } from '../config.js';
import type { ModerationRun, Verdict } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { normalizeResponse } from './normalizer.js';
import { buildModerationPrompt } from './prompt.js';
import { commentKey, type RecordStore } from './recordStore.js';

export interface BatchModeratorOptions {
  logger?: Logger;
  sleep?: Sleep;
}

export class BatchModerator {
  private readonly logger: Logger | undefined;
  private readonly sleep: Sleep;

  constructor(
    private readonly classifier: CommentClassifier,
    private readonly config: Pick<ModerationConfig, 'batchSize' | 'interBatchDelayMs'>,
    options: BatchModeratorOptions = {},
  ) {
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Classifies every record one batch at a time and merges the verdicts back into the store.
   * A failed request or unreadable reply drops that batch only; the run always completes.
   */
  async run(store: RecordStore): Promise<ModerationRun> {
    const batches = store.batches(this.config.batchSize);
    const verdicts: Verdict[] = [];
    const failedBatches: number[] = [];

    for (const [index, batch] of batches.entries()) {
      const batchNumber = index + 1;
      this.logger?.(`Processing batch ${batchNumber}/${batches.length} (${batch.length} comments)`);

      try {
        const reply = await this.classifier.classify(buildModerationPrompt(batch));
        const parsed = normalizeResponse(reply, this.logger);
        if (parsed.length === 0) {
          failedBatches.push(batchNumber);
        }
        verdicts.push(...parsed);
      } catch (error) {
        failedBatches.push(batchNumber);
        this.logger?.(`Error in batch ${batchNumber}: ${describeError(error)}`);
      }

      await this.sleep(this.config.interBatchDelayMs);
    }

    let merged = 0;
    let skipped = 0;
    for (const verdict of verdicts) {
      if (store.merge(verdict)) {
        merged += 1;
      } else {
        skipped += 1;
        this.logger?.(`Skipping unknown comment_id: ${commentKey(verdict.comment_id)}`);
      }
    }

    this.logger?.(
      `Merged ${merged} verdicts across ${batches.length} batches` +
        (failedBatches.length > 0 ? ` (no verdicts from batch ${failedBatches.join(', ')})` : '') +
        (skipped > 0 ? `; skipped ${skipped} with unknown ids` : ''),
    );

    return { verdicts, batches: batches.length, failedBatches, merged, skipped };
  }
}
