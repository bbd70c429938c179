import Papa from 'papaparse';
import type { UnparseConfig } from 'papaparse';
import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataFrame, DataWriter, ResultMetadata } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { formatCell } from '../../domain/services/TypeInference.js';

const schema = z.object({
  ...fileFields,
  delimiter: z.string().min(1).default(','),
  /** Write column names as the first row. */
  header: z.boolean().default(true),
  quoteChar: z.string().length(1).default('"'),
  /** Quote every field instead of only those that need it. */
  quotes: z.boolean().default(false),
  newline: z.string().min(1).default('\n'),
  /** Write only these columns, in this order. */
  columns: z.array(z.string()).nonempty().optional(),
});

export type CsvWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Writes delimited text with PapaParse. The file always ends with a newline. */
export class CsvWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'csv';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): CsvWriter {
    return new CsvWriter(parseAdapterConfig(schema, config, CsvWriter.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: CsvWriterConfig) {
    this.config = parseAdapterConfig(schema, config, CsvWriter.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  savingOptions(): CodecOptions {
    return compactOptions({ encoding: this.encoding, ...this.unparseConfig(), columns: this.config.columns });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    return saveToFile(CsvWriter, this.config.path, data, (frame) => this.encode(frame), this.encoding);
  }

  private unparseConfig(): UnparseConfig {
    const { delimiter, header, quoteChar, quotes, newline } = this.config;
    return { delimiter, header, quoteChar, quotes, newline };
  }

  private encode(frame: DataFrame): string {
    const selected = this.config.columns ? frame.select(this.config.columns) : frame;
    const rows = selected.toRecords().map((row) => selected.columns.map((name) => formatCell(row[name])));
    const body = Papa.unparse({ fields: [...selected.columns], data: rows }, this.unparseConfig());
    return body === '' ? body : body + this.config.newline;
  }
}
