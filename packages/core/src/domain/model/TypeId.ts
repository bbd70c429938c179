import { DataFrame } from './DataFrame.js';
import type { DataRecord } from './DataFrame.js';

/**
 * Identifiers of the in-memory representations an adapter can produce or accept.
 *
 * - `dataframe` — an immutable {@link DataFrame}
 * - `records` — an array of row objects
 */
export const TypeId = {
  DATAFRAME: 'dataframe',
  RECORDS: 'records',
} as const;

export type TypeId = (typeof TypeId)[keyof typeof TypeId];

/** TypeScript type of each representation. */
export interface DataTypeMap {
  dataframe: DataFrame;
  records: readonly DataRecord[];
}

export type DataOf<T extends TypeId> = DataTypeMap[T];

/** Any value of a supported representation. */
export type AnyData = DataTypeMap[TypeId];

export function isTypeId(value: unknown): value is TypeId {
  return Object.values(TypeId).some((id) => id === value);
}

/** Return the representation `value` belongs to, or `null` when it matches none. */
export function detectTypeId(value: unknown): TypeId | null {
  if (value instanceof DataFrame) return TypeId.DATAFRAME;
  if (isRecordArray(value)) return TypeId.RECORDS;
  return null;
}

/** True for an array whose every element is a plain object. */
export function isRecordArray(value: unknown): value is readonly DataRecord[] {
  return Array.isArray(value) && value.every(isPlainRecord);
}

function isPlainRecord(value: unknown): value is DataRecord {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Normalize any supported representation to a frame. */
export function toDataFrame(data: AnyData): DataFrame {
  return data instanceof DataFrame ? data : DataFrame.fromRecords(data);
}

const converters: { [K in TypeId]: (frame: DataFrame) => DataTypeMap[K] } = {
  dataframe: (frame) => frame,
  records: (frame) => frame.toRecords(),
};

/** Convert a frame into the requested representation. */
export function materialize<T extends TypeId>(frame: DataFrame, type: T): DataOf<T> {
  return converters[type](frame);
}
