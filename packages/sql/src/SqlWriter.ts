import { Sequelize } from 'sequelize';
import { z } from 'zod';
import {
  TypeId,
  assertSavable,
  buildResultMetadata,
  compactOptions,
  describeDataFrame,
  parseAdapterConfig,
  withCodec,
} from '@frameport/core';
import type { AnyData, CodecOptions, DataFrame, DataWriter, ResultMetadata } from '@frameport/core';
import { toAttributes } from './mappers/ColumnTypeMapper.js';
import { toInsertRows } from './mappers/RowMapper.js';
import { toTableName } from './utils/identifiers.js';

const IF_EXISTS = ['fail', 'replace', 'append'] as const;

const schema = z.object({
  tableName: z.string().trim().min(1, 'tableName must not be empty'),
  connection: z.instanceof(Sequelize, { message: 'connection must be a Sequelize instance' }),
  /** What to do when the table already exists. */
  ifExists: z.enum(IF_EXISTS).default('fail'),
  /** Write the row number as an extra leading column. */
  index: z.boolean().default(false),
  indexLabel: z.string().min(1).default('index'),
  schema: z.string().min(1).optional(),
});

export type SqlWriterConfig = z.input<typeof schema>;
export type IfExists = (typeof IF_EXISTS)[number];

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/**
 * Writes a frame into a table in one transaction: drop or create as
 * `ifExists` demands, then a single bulk insert.
 */
export class SqlWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'sql';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): SqlWriter {
    return new SqlWriter(parseAdapterConfig(schema, config, SqlWriter.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: SqlWriterConfig) {
    this.config = parseAdapterConfig(schema, config, SqlWriter.format);
  }

  savingOptions(): CodecOptions {
    const { ifExists, index, indexLabel, schema: tableSchema } = this.config;
    return compactOptions({ ifExists, index, indexLabel, schema: tableSchema });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    const { typeId, frame } = assertSavable(SqlWriter, data);
    const rows = await withCodec(SqlWriter, 'save', typeId, () => this.write(frame));

    return buildResultMetadata(
      { kind: 'sql', rows, tableName: this.config.tableName, timestamp: Date.now() },
      describeDataFrame(frame),
    );
  }

  private async write(frame: DataFrame): Promise<number> {
    const { connection, tableName, ifExists, index, indexLabel } = this.config;
    const target = toTableName(tableName, this.config.schema);
    const queryInterface = connection.getQueryInterface();
    const rows = toInsertRows(frame, { index, indexLabel });

    return connection.transaction(async (transaction) => {
      const exists = await queryInterface.tableExists(target, { transaction });
      if (exists && ifExists === 'fail') {
        throw new Error(`table '${tableName}' already exists`);
      }
      if (exists && ifExists === 'replace') {
        await queryInterface.dropTable(target, { transaction });
      }
      if (!exists || ifExists === 'replace') {
        await queryInterface.createTable(target, toAttributes(frame, { index, indexLabel }), { transaction });
      }
      if (rows.length > 0) {
        await queryInterface.bulkInsert(target, rows, { transaction });
      }
      return rows.length;
    });
  }
}

