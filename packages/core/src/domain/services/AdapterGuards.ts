import { CodecError, ConfigurationError, TypeMismatchError } from '../errors/DataPortErrors.js';
import type { CodecOperation } from '../errors/DataPortErrors.js';
import { TypeId, isRecordArray } from '../model/TypeId.js';
import { DataFrame } from '../model/DataFrame.js';
import type { ReaderClass, WriterClass } from '../ports/DataAdapter.js';

/** Minimal static description of an adapter, enough to check applicability and tag errors. */
export type AdapterDescriptor = Pick<ReaderClass | WriterClass, 'name' | 'format' | 'kind' | 'applicableTypes'>;

/**
 * Construct an adapter from untyped configuration. A `ConfigurationError`
 * is rethrown naming `typeId`.
 */
export function configureAdapter<A>(adapter: { fromConfig(config: unknown): A }, config: unknown, typeId: TypeId): A {
  try {
    return adapter.fromConfig(config);
  } catch (error) {
    if (error instanceof ConfigurationError && error.typeId === undefined) {
      throw error.forType(typeId);
    }
    throw error;
  }
}

/** Throw `TypeMismatchError` unless the reader declares `type`. */
export function assertLoadable(adapter: AdapterDescriptor, type: TypeId): void {
  const applicable = adapter.applicableTypes();
  if (!applicable.includes(type)) {
    throw new TypeMismatchError(adapter.format, 'reader', type, applicable);
  }
}

/**
 * Check that the writer declares the representation of `data` and normalize it
 * to a frame. Runs before any I/O.
 */
export function assertSavable(adapter: AdapterDescriptor, data: unknown): { typeId: TypeId; frame: DataFrame } {
  const applicable = adapter.applicableTypes();
  const accept = (typeId: TypeId): void => {
    if (!applicable.includes(typeId)) {
      throw new TypeMismatchError(adapter.format, 'writer', typeId, applicable);
    }
  };

  if (data instanceof DataFrame) {
    accept(TypeId.DATAFRAME);
    return { typeId: TypeId.DATAFRAME, frame: data };
  }
  if (isRecordArray(data)) {
    accept(TypeId.RECORDS);
    return { typeId: TypeId.RECORDS, frame: DataFrame.fromRecords(data) };
  }
  throw new TypeMismatchError(adapter.format, 'writer', describeValue(data), applicable);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}

/**
 * Run one codec call, turning any failure into a `CodecError` tagged with the
 * adapter's format, the operation, and the representation involved.
 * Errors that already are `CodecError`s pass through unchanged.
 */
export async function withCodec<T>(
  adapter: AdapterDescriptor,
  operation: CodecOperation,
  typeId: TypeId,
  call: () => T | Promise<T>,
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof CodecError) throw error;
    throw new CodecError(adapter.format, operation, adapter.name, typeId, error);
  }
}
