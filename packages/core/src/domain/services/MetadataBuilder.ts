import type { DataFrame, DtypeLabel } from '../model/DataFrame.js';
import type { DataFrameMetadata, ResultMetadata } from '../model/ResultMetadata.js';

/** Raw transport signals collected by a file transport. */
export interface FileTransportInfo {
  readonly kind: 'file';
  readonly path: string;
  readonly size: number;
  readonly lastModified: number;
  readonly timestamp: number;
}

/** Raw transport signals collected by a database transport. */
export interface SqlTransportInfo {
  readonly kind: 'sql';
  readonly rows: number;
  readonly query?: string;
  readonly tableName?: string;
  readonly timestamp: number;
}

export type TransportInfo = FileTransportInfo | SqlTransportInfo;

/** Shape signals of the materialized data. */
export interface DataShapeInfo {
  readonly rowCount: number;
  readonly columnNames: readonly string[];
  readonly columnDtypes: readonly DtypeLabel[];
}

/** Read the shape of `frame` as it is now. */
export function describeDataFrame(frame: DataFrame): DataShapeInfo {
  return {
    rowCount: frame.rowCount,
    columnNames: frame.columns,
    columnDtypes: frame.dtypes(),
  };
}

/**
 * Assemble the result envelope from transport and shape signals. Pure; performs no I/O.
 *
 * Throws when `columnNames` and `columnDtypes` are not aligned.
 */
export function buildResultMetadata(transport: TransportInfo, shape: DataShapeInfo): ResultMetadata {
  if (shape.columnNames.length !== shape.columnDtypes.length) {
    throw new Error(
      `MetadataBuilder: ${String(shape.columnNames.length)} column names but ${String(shape.columnDtypes.length)} dtypes`,
    );
  }

  const dataframeMetadata: DataFrameMetadata = {
    rows: shape.rowCount,
    columns: shape.columnNames.length,
    columnNames: [...shape.columnNames],
    datatypes: [...shape.columnDtypes],
  };

  if (transport.kind === 'file') {
    return {
      fileMetadata: {
        path: transport.path,
        size: transport.size,
        lastModified: transport.lastModified,
        timestamp: transport.timestamp,
        scheme: 'file',
      },
      dataframeMetadata,
    };
  }

  return {
    sqlMetadata: {
      rows: transport.rows,
      ...(transport.query !== undefined ? { query: transport.query } : {}),
      ...(transport.tableName !== undefined ? { tableName: transport.tableName } : {}),
      timestamp: transport.timestamp,
    },
    dataframeMetadata,
  };
}
