import { MODERATION_FIELDS, type CommentRecord, type Verdict } from '../types/index.js';

export function commentKey(commentId: unknown): string {
  return String(commentId);
}

export class RecordStore {
  private readonly index = new Map<string, CommentRecord>();

  private constructor(private readonly records: CommentRecord[]) {
    for (const record of records) {
      // duplicate ids: the later record takes the slot
      this.index.set(commentKey(record.comment_id), record);
    }
  }

  static from(records: CommentRecord[]): RecordStore {
    return new RecordStore([...records]);
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly CommentRecord[] {
    return this.records;
  }

  batches(size: number): CommentRecord[][] {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Batch size must be a positive integer (received ${size}).`);
    }

    const batches: CommentRecord[][] = [];
    for (let start = 0; start < this.records.length; start += size) {
      batches.push(this.records.slice(start, start + size));
    }
    return batches;
  }

  find(commentId: unknown): CommentRecord | undefined {
    return this.index.get(commentKey(commentId));
  }

  /** Copies the verdict's moderation fields onto its record. Returns false for an unknown id. */
  merge(verdict: Verdict): boolean {
    const record = this.find(verdict.comment_id);
    if (!record) {
      return false;
    }

    for (const field of MODERATION_FIELDS) {
      if (field in verdict) {
        record[field] = verdict[field];
      }
    }
    return true;
  }
}
