import type { DtypeLabel } from './DataFrame.js';

/** Transport facts for a file-backed load or save. */
export interface FileMetadata {
  /** Resolved absolute path of the file read or written. */
  readonly path: string;
  /** Size of the file in bytes after the operation. */
  readonly size: number;
  /** File modification time, epoch milliseconds. */
  readonly lastModified: number;
  /** When the operation completed, epoch milliseconds. */
  readonly timestamp: number;
  readonly scheme: 'file';
}

/** Transport facts for a database-backed load or save. */
export interface SqlMetadata {
  /** Rows inserted (save) or returned (load). */
  readonly rows: number;
  /** The query that was run, when the load was query-based. */
  readonly query?: string;
  /** The table read or written, when the operation targeted a table. */
  readonly tableName?: string;
  readonly timestamp: number;
}

/** Shape facts about the materialized dataset. */
export interface DataFrameMetadata {
  readonly rows: number;
  readonly columns: number;
  readonly columnNames: readonly string[];
  /** dtype labels aligned with `columnNames`. */
  readonly datatypes: readonly DtypeLabel[];
}

export interface FileResultMetadata {
  readonly fileMetadata: FileMetadata;
  readonly dataframeMetadata: DataFrameMetadata;
}

export interface SqlResultMetadata {
  readonly sqlMetadata: SqlMetadata;
  readonly dataframeMetadata: DataFrameMetadata;
}

/**
 * Envelope returned by every load and save.
 *
 * Exactly one transport partition is present, chosen by the adapter's transport
 * kind; `dataframeMetadata` is always present.
 */
export type ResultMetadata = FileResultMetadata | SqlResultMetadata;

export function isFileMetadata(metadata: ResultMetadata): metadata is FileResultMetadata {
  return 'fileMetadata' in metadata;
}

export function isSqlMetadata(metadata: ResultMetadata): metadata is SqlResultMetadata {
  return 'sqlMetadata' in metadata;
}
