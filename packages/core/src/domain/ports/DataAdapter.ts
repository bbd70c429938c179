import type { ZodTypeAny } from 'zod';
import type { AnyData, DataOf, TypeId } from '../model/TypeId.js';
import type { ResultMetadata } from '../model/ResultMetadata.js';

/** Direction of an adapter: readers produce data, writers consume it. */
export type AdapterKind = 'reader' | 'writer';

/** Options forwarded verbatim to one codec call. */
export type CodecOptions = Readonly<Record<string, unknown>>;

/** Data plus the envelope describing how it was loaded. */
export interface LoadResult<T extends TypeId> {
  readonly data: DataOf<T>;
  readonly metadata: ResultMetadata;
}

/**
 * Port for loading one dataset from one format.
 *
 * An instance is configured at construction, used for exactly one `load()`,
 * and discarded.
 */
export interface DataReader {
  /** The exact option map passed to the decode call. Never includes path or connection fields. */
  loadingOptions(): CodecOptions;
  /**
   * Load the dataset materialized as `type`. Throws `TypeMismatchError` before
   * any I/O when `type` is not applicable.
   */
  load<T extends TypeId>(type: T): Promise<LoadResult<T>>;
}

/** Port for saving one dataset to one format. Construct once, save once. */
export interface DataWriter {
  /** The exact option map passed to the encode call. Never includes path or connection fields. */
  savingOptions(): CodecOptions;
  /**
   * Save `data`. Throws `TypeMismatchError` before any I/O when its
   * representation is not applicable.
   */
  save(data: AnyData): Promise<ResultMetadata>;
}

/** Static side shared by reader and writer classes. */
interface AdapterClassBase<A> {
  /** Class name, used in error messages. */
  readonly name: string;
  readonly format: string;
  /** Declarative configuration model, validated at construction. */
  readonly configSchema: ZodTypeAny;
  /** Ordered, non-empty, fixed set of supported representations. Callable without an instance. */
  applicableTypes(): readonly TypeId[];
  /** Validate untyped configuration and construct an instance. */
  fromConfig(config: unknown): A;
}

export interface ReaderClass<R extends DataReader = DataReader> extends AdapterClassBase<R> {
  readonly kind: 'reader';
}

export interface WriterClass<W extends DataWriter = DataWriter> extends AdapterClassBase<W> {
  readonly kind: 'writer';
}

export type AdapterClass = ReaderClass | WriterClass;
