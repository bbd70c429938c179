import { z } from 'zod';
import { DataFrame, TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, LoadResult } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { inferColumn } from '../../domain/services/TypeInference.js';
import { parseHtmlTables, tableText } from './htmlCodec.js';
import type { HtmlTable } from './htmlCodec.js';

const schema = z.object({
  ...fileFields,
  /** Which of the (matching) tables to read. */
  tableIndex: z.number().int().nonnegative().default(0),
  /** Regular expression a table's text must match to be considered. */
  match: z
    .string()
    .min(1)
    .refine(isValidPattern, { message: 'match must be a valid regular expression' })
    .optional(),
  /** Use the first row as column names when the table has no `<thead>`. */
  header: z.boolean().default(true),
  inferTypes: z.boolean().default(true),
});

export type HtmlReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME];

/** Reads one `<table>` from an HTML document. */
export class HtmlReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'html';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): HtmlReader {
    return new HtmlReader(parseAdapterConfig(schema, config, HtmlReader.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: HtmlReaderConfig) {
    this.config = parseAdapterConfig(schema, config, HtmlReader.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  loadingOptions(): CodecOptions {
    const { tableIndex, match, header, inferTypes } = this.config;
    return compactOptions({ encoding: this.encoding, tableIndex, match, header, inferTypes });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(HtmlReader, this.config.path, type, (bytes) => this.decode(bytes.toString(this.encoding)));
  }

  private decode(html: string): DataFrame {
    const pattern = this.config.match === undefined ? null : new RegExp(this.config.match);
    const tables = parseHtmlTables(html).filter((table) => !pattern || pattern.test(tableText(table)));
    if (tables.length === 0) {
      throw new Error(pattern ? `no tables matching /${pattern.source}/` : 'no tables found');
    }

    const table = tables[this.config.tableIndex];
    if (!table) {
      throw new Error(`table index ${String(this.config.tableIndex)} is out of range (${String(tables.length)} tables)`);
    }
    return this.toFrame(table);
  }

  private toFrame(table: HtmlTable): DataFrame {
    const useFirstRow = table.head === null && this.config.header;
    const head = table.head ?? (useFirstRow ? table.rows[0] : undefined);
    const body = useFirstRow ? table.rows.slice(1) : table.rows;
    const width = head?.length ?? body.reduce((max, row) => Math.max(max, row.length), 0);
    const names = Array.from({ length: width }, (_, i) => {
      if (!head) return String(i);
      const name = head[i] ?? '';
      return name === '' ? `Unnamed: ${String(i)}` : name;
    });

    const columns: Record<string, unknown[]> = {};
    names.forEach((name, i) => {
      const values = body.map((row) => row[i] ?? null);
      columns[name] = this.config.inferTypes ? inferColumn(values) : values;
    });
    body.forEach((row, index) => {
      if (row.length > width) {
        throw new Error(`row ${String(index + 1)} has ${String(row.length)} cells, expected ${String(width)}`);
      }
    });
    return DataFrame.fromColumns(columns, names);
  }
}

function isValidPattern(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}
