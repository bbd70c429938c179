import type { DataFrame } from '@frameport/core';

/** Cell value restricted to what every text serializer can express. */
export function toPlainValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return null;
  return value;
}

/** Apply {@link toPlainValue} to every cell. */
export function toPlainFrame(frame: DataFrame): DataFrame {
  return frame.columns.reduce((current, name) => current.mapColumn(name, toPlainValue), frame);
}
