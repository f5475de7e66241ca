/**
 * CSV record source (stdin) and record sink (stdout).
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

export type Field = string | number | boolean;

export interface Output {
  write(chunk: string): unknown;
}

const recordsSchema = z.array(z.array(z.string()));

/**
 * First column of every non-empty row, in order. Rows have no header.
 */
export function parseUsernames(content: string): string[] {
  const records: unknown = parse(content, {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  return recordsSchema
    .parse(records)
    .filter((row) => row.length > 0 && row[0] !== '')
    .map((row) => row[0]);
}

export async function readAll(input: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
  }
  return chunks.join('');
}

export class CsvSink {
  constructor(private readonly output: Output) {}

  writeRow(fields: Field[]): void {
    this.output.write(stringify([fields.map(String)]));
  }
}
