import { parquetWriteBuffer } from 'hyparquet-writer';
import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataWriter, ResultMetadata } from '@frameport/core';
import { frameToColumnData } from './parquetColumns.js';

const schema = z.object({
  path: z.string().min(1, 'path must not be empty'),
  /** Snappy-compress the column chunks. */
  compressed: z.boolean().default(true),
});

export type ParquetWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME];

/** Writes Apache Parquet through hyparquet-writer. Accepts frames only. */
export class ParquetWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'parquet';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): ParquetWriter {
    return new ParquetWriter(parseAdapterConfig(schema, config, ParquetWriter.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: ParquetWriterConfig) {
    this.config = parseAdapterConfig(schema, config, ParquetWriter.format);
  }

  savingOptions(): CodecOptions {
    return compactOptions({ compressed: this.config.compressed });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    return saveToFile(ParquetWriter, this.config.path, data, (frame) =>
      new Uint8Array(
        parquetWriteBuffer({ columnData: frameToColumnData(frame), compressed: this.config.compressed }),
      ),
    );
  }
}
