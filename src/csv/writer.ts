import { once } from 'node:events';
import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { RecordStore } from '../moderation/recordStore.js';
import { MODERATION_FIELDS, type CommentRecord } from '../types/index.js';
import { stringifyValue } from '../utils/text.js';

export type CsvRow = Readonly<Record<string, unknown>>;

export class CsvStreamWriter {
  private failure: Error | null = null;

  private constructor(
    private readonly stream: WriteStream,
    private readonly header: readonly string[],
  ) {
    // Open and write errors surface on the next writeRow or close.
    stream.on('error', (error) => {
      this.failure = error;
    });
  }

  static async create(destination: string, header: readonly string[]): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const writer = new CsvStreamWriter(createWriteStream(destination, { encoding: 'utf8' }), header);
    writer.stream.write(`${header.map(csvEscape).join(',')}\r\n`);
    return writer;
  }

  async writeRow(row: CsvRow): Promise<void> {
    this.throwIfFailed();
    const line = this.header.map((key) => csvEscape(stringifyValue(row[key]))).join(',');
    if (!this.stream.write(`${line}\r\n`)) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    this.stream.end();
    await finished(this.stream);
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

/** Every field seen across the records in first-seen order, followed by any moderation field not already present. */
export function moderatedHeader(records: readonly CommentRecord[]): string[] {
  const fields = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      fields.add(key);
    }
  }
  for (const field of MODERATION_FIELDS) {
    fields.add(field);
  }
  return [...fields];
}

export async function exportModeratedCsv(destination: string, store: RecordStore): Promise<number> {
  const records = store.all();
  const writer = await CsvStreamWriter.create(destination, moderatedHeader(records));
  let written = 0;
  for (const record of records) {
    await writer.writeRow(record);
    written += 1;
  }
  await writer.close();
  return written;
}

export function csvEscape(value: string): string {
  const needsQuotes = /[",\r\n]/.test(value);
  return needsQuotes ? `"${value.replace(/"/g, '""')}"` : value;
}
