import { tableToIPC } from 'apache-arrow';
import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataWriter, ResultMetadata } from '@frameport/core';
import { frameToTable } from './arrowColumns.js';

const schema = z.object({
  path: z.string().min(1, 'path must not be empty'),
  /** `file` is Feather v2; `stream` is the Arrow streaming format. */
  ipcFormat: z.enum(['file', 'stream']).default('file'),
});

export type FeatherWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME];

/** Writes Feather v2 / Arrow IPC. Accepts frames only. */
export class FeatherWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'feather';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): FeatherWriter {
    return new FeatherWriter(parseAdapterConfig(schema, config, FeatherWriter.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: FeatherWriterConfig) {
    this.config = parseAdapterConfig(schema, config, FeatherWriter.format);
  }

  savingOptions(): CodecOptions {
    return compactOptions({ ipcFormat: this.config.ipcFormat });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    return saveToFile(FeatherWriter, this.config.path, data, (frame) =>
      tableToIPC(frameToTable(frame), this.config.ipcFormat),
    );
  }
}
