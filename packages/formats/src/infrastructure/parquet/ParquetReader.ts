import { parquetMetadata, parquetReadObjects, parquetSchema } from 'hyparquet';
import { z } from 'zod';
import { TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataFrame, DataReader, LoadResult } from '@frameport/core';
import { rowsToFrame } from './parquetColumns.js';

const schema = z.object({
  path: z.string().min(1, 'path must not be empty'),
  /** Read only these columns, in this order. */
  columns: z.array(z.string()).nonempty().optional(),
});

export type ParquetReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME];

/** Reads Apache Parquet files through hyparquet. */
export class ParquetReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'parquet';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): ParquetReader {
    return new ParquetReader(parseAdapterConfig(schema, config, ParquetReader.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: ParquetReaderConfig) {
    this.config = parseAdapterConfig(schema, config, ParquetReader.format);
  }

  loadingOptions(): CodecOptions {
    return compactOptions({ columns: this.config.columns });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(ParquetReader, this.config.path, type, (bytes) => this.decode(bytes));
  }

  private async decode(bytes: Buffer): Promise<DataFrame> {
    // hyparquet slices the buffer it is given, so hand it one of its own
    const file = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(file).set(bytes);

    const metadata = parquetMetadata(file);
    const available = parquetSchema(metadata).children.map((child) => child.element.name);
    const columns = this.config.columns ?? available;
    for (const name of columns) {
      if (!available.includes(name)) {
        throw new Error(`column '${name}' not found (available: ${available.join(', ')})`);
      }
    }

    const rows: Record<string, unknown>[] = await parquetReadObjects({ file, metadata, columns: [...columns] });
    return rowsToFrame(rows, columns);
  }
}
