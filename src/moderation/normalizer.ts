import { z } from 'zod';
import type { Verdict } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { truncate } from '../utils/text.js';

const FENCED_JSON_BLOCK = /```json[^\S\n]*\r?\n([\s\S]*?)\r?\n[^\S\n]*```/i;

// UTF-8 smart quotes decoded as Mac Roman or Windows-1252.
const MOJIBAKE_QUOTES: ReadonlyArray<readonly [string, string]> = [
  ['‚Äú', '“'],
  ['‚Äù', '”'],
  ['‚Äò', '‘'],
  ['‚Äô', '’'],
  ['â€œ', '“'],
  ['â€\u009D', '”'],
  ['â€˜', '‘'],
  ['â€™', '’'],
];

const DOUBLE_QUOTE_LOOKALIKES = /(?<!\\)[“”„″＂]/g;
const BACKSLASH_SEQUENCE = /\\(["\\/bfnrtu])|\\/g;

const verdictArraySchema = z.array(z.unknown());
const verdictSchema = z.record(z.string(), z.unknown());

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: string };

export function extractJsonBlock(text: string): string {
  const inner = FENCED_JSON_BLOCK.exec(text)?.[1];
  return (inner ?? text).trim();
}

export function normalizeMojibake(text: string): string {
  return MOJIBAKE_QUOTES.reduce((current, [broken, quote]) => current.split(broken).join(quote), text);
}

export function repairQuotes(text: string): string {
  return text.replace(DOUBLE_QUOTE_LOOKALIKES, '"');
}

export function stripInvalidEscapes(text: string): string {
  return text.replace(BACKSLASH_SEQUENCE, (sequence, escape: string | undefined) => (escape ? sequence : ''));
}

/** Every repair step applied at once; `normalizeResponse` applies them one at a time. */
export function repairJsonText(text: string): string {
  return repairQuotes(stripInvalidEscapes(normalizeMojibake(text)));
}

/**
 * Turns a raw model reply into verdicts. Repairs are tried in increasing order of intrusiveness:
 * mojibake only, then invalid escapes stripped, then curly double quotes rewritten. Unrecoverable
 * text yields an empty list and a warning; this function does not throw.
 */
export function normalizeResponse(raw: string, logger?: Logger): Verdict[] {
  const block = normalizeMojibake(extractJsonBlock(raw));
  let attempt = tryParse(block);
  if (!attempt.ok) {
    attempt = tryParse(stripInvalidEscapes(block));
  }
  if (!attempt.ok) {
    attempt = tryParse(repairQuotes(stripInvalidEscapes(block)));
  }

  if (!attempt.ok) {
    logger?.(`Failed to parse JSON after sanitizing (${attempt.error}). Skipping batch.`);
    return [];
  }

  return parseVerdictArray(attempt.value, logger);
}

export function parseVerdictArray(value: unknown, logger?: Logger): Verdict[] {
  const list = verdictArraySchema.safeParse(value);
  if (!list.success) {
    logger?.('Model output is not a JSON list. Skipping batch.');
    return [];
  }

  const verdicts: Verdict[] = [];
  list.data.forEach((item, index) => {
    const verdict = verdictSchema.safeParse(item);
    if (verdict.success) {
      verdicts.push(verdict.data);
    } else {
      logger?.(`Ignoring verdict #${index + 1}: expected an object, got ${truncate(JSON.stringify(item) ?? 'undefined', 60)}`);
    }
  });
  return verdicts;
}

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
