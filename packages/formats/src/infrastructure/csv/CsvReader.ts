import Papa from 'papaparse';
import type { ParseConfig, ParseError } from 'papaparse';
import { z } from 'zod';
import { DataFrame, TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, LoadResult } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';

const schema = z.object({
  ...fileFields,
  /** Field separator. Default: auto-detected. */
  delimiter: z.string().min(1).optional(),
  /** Treat the first row as column names. Otherwise columns are named `0`, `1`, ... */
  header: z.boolean().default(true),
  /** Convert numeric and boolean cells. */
  dynamicTyping: z.boolean().default(true),
  skipEmptyLines: z.union([z.boolean(), z.literal('greedy')]).default(true),
  quoteChar: z.string().length(1).default('"'),
  /** Lines starting with this string are ignored. */
  comments: z.string().min(1).optional(),
  /** Read at most this many rows (the header row included). */
  preview: z.number().int().positive().optional(),
});

export type CsvReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Reads delimited text with PapaParse. */
export class CsvReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'csv';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): CsvReader {
    return new CsvReader(parseAdapterConfig(schema, config, CsvReader.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: CsvReaderConfig) {
    this.config = parseAdapterConfig(schema, config, CsvReader.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  /** The text encoding plus the exact options handed to `Papa.parse`. */
  loadingOptions(): CodecOptions {
    return compactOptions({ encoding: this.encoding, ...this.parseConfig() });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(CsvReader, this.config.path, type, (bytes) => this.decode(bytes.toString(this.encoding)));
  }

  /**
   * A fresh, mutable option object: Papa writes back into its config. The
   * header row is split off here, not by Papa, so `header` is always false.
   */
  private parseConfig(): ParseConfig<unknown[]> {
    const { delimiter, dynamicTyping, skipEmptyLines, quoteChar, comments, preview } = this.config;
    return { ...compactOptions({ delimiter, dynamicTyping, skipEmptyLines, quoteChar, comments, preview, header: false }) };
  }

  private decode(text: string): DataFrame {
    const result = Papa.parse<unknown[]>(text, this.parseConfig());
    const fatal = result.errors.filter(isFatal);
    const first = fatal[0];
    if (first) {
      const where = first.row === undefined ? '' : ` (row ${String(first.row)})`;
      throw new Error(`${first.message}${where}`);
    }

    const rows = result.data;
    const headerRow = this.config.header ? rows[0] : undefined;
    const body = this.config.header ? rows.slice(1) : rows;
    const width = body.reduce((max, row) => Math.max(max, row.length), 0);
    const names = headerRow
      ? headerRow.map((cell) => String(cell ?? ''))
      : Array.from({ length: width }, (_, i) => String(i));

    const columns: Record<string, unknown[]> = {};
    for (const name of names) {
      columns[name] = [];
    }
    body.forEach((row, index) => {
      if (row.length > names.length) {
        throw new Error(`expected ${String(names.length)} fields, saw ${String(row.length)} (row ${String(index + 1)})`);
      }
      names.forEach((name, i) => {
        columns[name]?.push(emptyToNull(row[i]));
      });
    });
    return DataFrame.fromColumns(columns, names);
  }
}

/** Delimiter guessing fails on single-column input; that is not an error. */
function isFatal(error: ParseError): boolean {
  return error.type !== 'Delimiter';
}

function emptyToNull(cell: unknown): unknown {
  return cell === undefined || cell === '' ? null : cell;
}
