import { QueryTypes, Sequelize } from 'sequelize';
import { z } from 'zod';
import {
  TypeId,
  assertLoadable,
  buildResultMetadata,
  compactOptions,
  describeDataFrame,
  materialize,
  parseAdapterConfig,
  withCodec,
} from '@frameport/core';
import type { CodecOptions, DataFrame, DataReader, LoadResult } from '@frameport/core';
import { fromRows } from './mappers/RowMapper.js';
import { isTableReference, parseTableReference } from './utils/identifiers.js';

const schema = z.object({
  /** A table name (`table` or `schema.table`) or a SQL query. */
  queryOrTable: z.string().trim().min(1, 'queryOrTable must not be empty'),
  connection: z.instanceof(Sequelize, { message: 'connection must be a Sequelize instance' }),
  /** Convert decimal strings returned by the driver into numbers. */
  coerceFloat: z.boolean().default(true),
  /** Replacements for `?` or `:name` placeholders in the query. */
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
  /** Columns to convert into `Date`. */
  parseDates: z.array(z.string().min(1)).optional(),
});

export type SqlReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/**
 * Reads the result of a query, or a whole table, through a caller-owned
 * Sequelize connection.
 */
export class SqlReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'sql';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): SqlReader {
    return new SqlReader(parseAdapterConfig(schema, config, SqlReader.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: SqlReaderConfig) {
    this.config = parseAdapterConfig(schema, config, SqlReader.format);
  }

  loadingOptions(): CodecOptions {
    const { coerceFloat, params, parseDates } = this.config;
    return compactOptions({ coerceFloat, params, parseDates });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    assertLoadable(SqlReader, type);

    const { queryOrTable } = this.config;
    const table = isTableReference(queryOrTable);
    const frame = await withCodec(SqlReader, 'load', type, () =>
      table ? this.readTable(queryOrTable) : this.readQuery(queryOrTable),
    );

    const metadata = buildResultMetadata(
      {
        kind: 'sql',
        rows: frame.rowCount,
        ...(table ? { tableName: queryOrTable } : { query: queryOrTable }),
        timestamp: Date.now(),
      },
      describeDataFrame(frame),
    );
    return { data: materialize(frame, type), metadata };
  }

  private async readTable(reference: string): Promise<DataFrame> {
    const { connection } = this.config;
    const queryInterface = connection.getQueryInterface();
    const rows = await connection.query(`SELECT * FROM ${queryInterface.quoteIdentifiers(reference)}`, {
      type: QueryTypes.SELECT,
    });
    if (rows.length > 0) {
      return this.toFrame(rows);
    }
    // An empty result carries no column names; take them from the table definition.
    const description = await queryInterface.describeTable(parseTableReference(reference));
    return this.toFrame(rows, Object.keys(description));
  }

  private async readQuery(sql: string): Promise<DataFrame> {
    const rows = await this.config.connection.query(sql, {
      type: QueryTypes.SELECT,
      replacements: this.config.params,
    });
    return this.toFrame(rows);
  }

  private toFrame(rows: readonly object[], columns?: readonly string[]): DataFrame {
    return fromRows(rows, {
      coerceFloat: this.config.coerceFloat,
      parseDates: this.config.parseDates,
      columns,
    });
  }
}
