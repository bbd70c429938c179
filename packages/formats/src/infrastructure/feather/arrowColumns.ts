import { Bool, Float64, Int64, Table, Utf8, vectorFromArray } from 'apache-arrow';
import type { Vector } from 'apache-arrow';
import { DataFrame, inferDtype } from '@frameport/core';
import { formatCell, isBigIntColumn } from '../../domain/services/TypeInference.js';

/**
 * Choose an Arrow vector for one column: booleans as Bool, integer columns
 * holding a bigint as Int64, other numbers as Float64, everything else as
 * Utf8 text. Nulls stay null.
 */
export function columnToVector(values: readonly unknown[]): Vector {
  const dtype = inferDtype(values);
  const present = values.filter((value) => value !== null);

  if (present.length > 0 && present.every((value) => typeof value === 'boolean')) {
    return vectorFromArray(values.map((value) => (typeof value === 'boolean' ? value : null)), new Bool());
  }
  if (isBigIntColumn(present)) {
    return vectorFromArray(
      values.map((value) => (typeof value === 'bigint' ? value : typeof value === 'number' ? BigInt(value) : null)),
      new Int64(),
    );
  }
  if (dtype === 'int64' || dtype === 'float64') {
    return vectorFromArray(
      values.map((value) => (typeof value === 'number' || typeof value === 'bigint' ? Number(value) : null)),
      new Float64(),
    );
  }
  return vectorFromArray(
    values.map((value) => (value === null ? null : typeof value === 'string' ? value : formatCell(value))),
    new Utf8(),
  );
}

/** Build an Arrow table whose fields follow the frame's column order. */
export function frameToTable(frame: DataFrame): Table {
  const vectors: Record<string, Vector> = {};
  for (const name of frame.columns) {
    vectors[name] = columnToVector(frame.column(name));
  }
  return new Table(vectors).select([...frame.columns]);
}

/** Read every field of `table`, optionally restricted to `columns`, into a frame. */
export function tableToFrame(table: Table, columns?: readonly string[]): DataFrame {
  const available = table.schema.fields.map((field) => field.name);
  const names = columns ?? available;

  const data: Record<string, unknown[]> = {};
  for (const name of names) {
    const vector = table.getChild(name);
    if (!vector) {
      throw new Error(`column '${name}' not found (available: ${available.join(', ')})`);
    }
    data[name] = Array.from(vector);
  }
  return DataFrame.fromColumns(data, names);
}
