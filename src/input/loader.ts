import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { parseCsv } from '../csv/parser.js';
import type { CommentRecord } from '../types/index.js';

export type InputFormat = 'csv' | 'json';

const requiredValue = z.unknown().refine((value) => value !== undefined && value !== null, 'is required');

const recordSchema = z.object({
  comment_id: requiredValue,
  comment_text: requiredValue,
});

const recordListSchema = z.array(z.record(z.string(), z.unknown()), {
  invalid_type_error: 'JSON input must be a top-level array of objects.',
});

export function detectFormat(filePath: string): InputFormat {
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.csv') {
    return 'csv';
  }
  if (extension === '.json') {
    return 'json';
  }
  throw new Error('Unsupported file format. Use .csv or .json');
}

export async function loadComments(filePath: string): Promise<CommentRecord[]> {
  const format = detectFormat(filePath);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`Input file not found at ${filePath}`);
    }
    throw error;
  }

  return parseComments(raw, format);
}

export function parseComments(raw: string, format: InputFormat): CommentRecord[] {
  const rows: Record<string, unknown>[] = format === 'csv' ? parseCsv(raw).rows : parseJsonRecords(raw);

  return rows.map((row, index) => {
    const parsed = recordSchema.safeParse(row);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') ?? 'record';
      throw new Error(`Comment #${index + 1}: ${field} ${issue?.message ?? 'is invalid'}`);
    }
    // spreading the row first keeps the input's field order
    return { ...row, comment_id: row.comment_id, comment_text: row.comment_text };
  });
}

function parseJsonRecords(raw: string): Record<string, unknown>[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Input file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const records = recordListSchema.safeParse(parsed);
  if (!records.success) {
    throw new Error('JSON input must be a top-level array of objects.');
  }
  return records.data;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
