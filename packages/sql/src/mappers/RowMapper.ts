import { DataFrame } from '@frameport/core';
import type { DataRecord } from '@frameport/core';
import type { IndexColumn } from './ColumnTypeMapper.js';

const DECIMAL_PATTERN = /^[+-]?\d+\.\d+(?:[eE][+-]?\d+)?$/;

/** Rows ready for `bulkInsert`, with the row number first when `index` is set. */
export function toInsertRows(frame: DataFrame, options: IndexColumn): Record<string, unknown>[] {
  return frame.toRecords().map((record, position) => {
    const row: Record<string, unknown> = options.index ? { [options.indexLabel]: position } : {};
    for (const name of frame.columns) {
      row[name] = toBindValue(record[name]);
    }
    return row;
  });
}

export function toBindValue(value: unknown): unknown {
  if (value === undefined || value === null) return null;
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  if (value instanceof Date || value instanceof Uint8Array) return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}

export interface FrameOptions {
  readonly coerceFloat: boolean;
  readonly parseDates?: readonly string[];
  /** Column order to use when the result has no rows. */
  readonly columns?: readonly string[];
}

/** Build a frame from driver rows, then apply float coercion and date parsing. */
export function fromRows(rows: readonly object[], options: FrameOptions): DataFrame {
  const records: DataRecord[] = rows.map((row) => Object.fromEntries(Object.entries(row)));
  let frame =
    records.length === 0 && options.columns
      ? DataFrame.fromColumns(Object.fromEntries(options.columns.map((name) => [name, []])), options.columns)
      : DataFrame.fromRecords(records);

  if (options.coerceFloat) {
    for (const name of frame.columns) {
      frame = frame.mapColumn(name, coerceDecimal);
    }
  }
  for (const name of options.parseDates ?? []) {
    if (!frame.hasColumn(name)) {
      throw new Error(`cannot parse dates in column '${name}': no such column`);
    }
    frame = frame.mapColumn(name, (value) => toDate(value, name));
  }
  return frame;
}

/** Decimal strings, as drivers return NUMERIC values, become numbers. */
export function coerceDecimal(value: unknown): unknown {
  return typeof value === 'string' && DECIMAL_PATTERN.test(value) ? Number(value) : value;
}

export function toDate(value: unknown, column: string): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'number' || typeof value === 'string') {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  throw new Error(`cannot parse ${JSON.stringify(value)} as a date in column '${column}'`);
}
