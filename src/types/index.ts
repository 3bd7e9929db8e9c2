export const MODERATION_FIELDS = ['is_offensive', 'offense_type', 'explanation'] as const;

export type ModerationField = (typeof MODERATION_FIELDS)[number];

/**
 * One input comment. CSV input yields string values only; JSON input keeps whatever the file held.
 * Moderation fields are absent until a verdict is merged.
 */
export interface CommentRecord {
  comment_id: unknown;
  comment_text: unknown;
  is_offensive?: unknown;
  offense_type?: unknown;
  explanation?: unknown;
  [field: string]: unknown;
}

export interface Verdict {
  comment_id?: unknown;
  is_offensive?: unknown;
  offense_type?: unknown;
  explanation?: unknown;
  [field: string]: unknown;
}

export interface OffensiveComment {
  commentId: string;
  text: string;
  offenseType: string;
  explanation: string;
}

export interface AggregateReport {
  total: number;
  offensive: number;
  typeCounts: Map<string, number>;
  topOffensive: OffensiveComment[];
}

export interface ModerationRun {
  verdicts: Verdict[];
  batches: number;
  /** 1-based numbers of batches that produced no verdicts (request failed or reply unreadable). */
  failedBatches: number[];
  merged: number;
  skipped: number;
}
