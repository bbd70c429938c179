import type { parquetWriteBuffer } from 'hyparquet-writer';
import { DataFrame, inferDtype } from '@frameport/core';
import type { DataRecord } from '@frameport/core';
import { formatCell, isBigIntColumn } from '../../domain/services/TypeInference.js';

type ColumnSource = Parameters<typeof parquetWriteBuffer>[0]['columnData'][number];

/**
 * Physical type per column, matching the Feather mapping: booleans as BOOLEAN,
 * integer columns holding a bigint as INT64, other numbers as DOUBLE,
 * everything else as UTF-8 STRING.
 */
export function columnToParquet(name: string, values: readonly unknown[]): ColumnSource {
  const present = values.filter((value) => value !== null && value !== undefined);

  if (present.length > 0 && present.every((value) => typeof value === 'boolean')) {
    return { name, type: 'BOOLEAN', data: values.map((value) => (typeof value === 'boolean' ? value : null)) };
  }
  if (isBigIntColumn(present)) {
    return {
      name,
      type: 'INT64',
      data: values.map((value) => (typeof value === 'bigint' ? value : typeof value === 'number' ? BigInt(value) : null)),
    };
  }
  const dtype = inferDtype(values);
  if (dtype === 'int64' || dtype === 'float64') {
    return {
      name,
      type: 'DOUBLE',
      data: values.map((value) => (typeof value === 'number' || typeof value === 'bigint' ? Number(value) : null)),
    };
  }
  return {
    name,
    type: 'STRING',
    data: values.map((value) => (value === null || value === undefined ? null : formatCell(value))),
  };
}

export function frameToColumnData(frame: DataFrame): ColumnSource[] {
  return frame.columns.map((name) => columnToParquet(name, frame.column(name)));
}

/** Row objects from the decoder; missing cells become null. */
export function rowsToFrame(rows: readonly Record<string, unknown>[], columns: readonly string[]): DataFrame {
  const records: DataRecord[] = rows.map((row) =>
    Object.fromEntries(columns.map((name) => [name, row[name] ?? null])),
  );
  return DataFrame.fromRecords(records, columns);
}
