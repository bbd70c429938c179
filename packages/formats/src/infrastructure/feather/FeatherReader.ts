import { tableFromIPC } from 'apache-arrow';
import { z } from 'zod';
import { TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, LoadResult } from '@frameport/core';
import { tableToFrame } from './arrowColumns.js';

const schema = z.object({
  path: z.string().min(1, 'path must not be empty'),
  /** Read only these columns, in this order. */
  columns: z.array(z.string()).nonempty().optional(),
});

export type FeatherReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME];

/** Reads Feather v2 / Arrow IPC (file or stream format). */
export class FeatherReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'feather';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): FeatherReader {
    return new FeatherReader(parseAdapterConfig(schema, config, FeatherReader.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: FeatherReaderConfig) {
    this.config = parseAdapterConfig(schema, config, FeatherReader.format);
  }

  loadingOptions(): CodecOptions {
    return compactOptions({ columns: this.config.columns });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(FeatherReader, this.config.path, type, (bytes) =>
      tableToFrame(tableFromIPC(bytes), this.config.columns),
    );
  }
}
