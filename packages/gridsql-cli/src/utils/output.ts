/**
 * Row output formats
 */

import type { Row, SqlValue } from 'gridsql';

export type OutputFormat = 'ndjson' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['ndjson', 'csv'];

export interface RowWriter {
  /** Called once, before the first row */
  begin(columns: string[]): void;
  write(row: Row): void;
}

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return hex(value);
  return value;
}

/**
 * A CSV field; quoted when it holds a comma, a quote or a line break
 */
export function csvField(value: SqlValue | undefined): string {
  if (value === null || value === undefined) return '';

  let text: string;
  if (value instanceof Date) text = value.toISOString();
  else if (value instanceof Uint8Array) text = hex(value);
  else text = String(value);

  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function createRowWriter(format: OutputFormat, emit: (line: string) => void): RowWriter {
  if (format === 'csv') {
    let columns: string[] = [];
    return {
      begin(names) {
        columns = names;
        emit(names.map((name) => csvField(name)).join(','));
      },
      write(row) {
        emit(columns.map((name) => csvField(row[name])).join(','));
      },
    };
  }

  return {
    begin() {},
    write(row) {
      emit(JSON.stringify(row, jsonReplacer));
    },
  };
}
