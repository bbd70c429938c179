import { Packr } from 'msgpackr';
import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataWriter, ResultMetadata } from '@frameport/core';

const schema = z.object({
  path: z.string().min(1, 'path must not be empty'),
  /** msgpackr record extension. Off by default so other MessagePack decoders can read the file. */
  useRecords: z.boolean().default(false),
});

export type MsgpackWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Writes `{ columns, data }` with one array per column. */
export class MsgpackWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'msgpack';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): MsgpackWriter {
    return new MsgpackWriter(parseAdapterConfig(schema, config, MsgpackWriter.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: MsgpackWriterConfig) {
    this.config = parseAdapterConfig(schema, config, MsgpackWriter.format);
  }

  savingOptions(): CodecOptions {
    return compactOptions({ useRecords: this.config.useRecords });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    return saveToFile(MsgpackWriter, this.config.path, data, (frame) => {
      const packr = new Packr({ useRecords: this.config.useRecords });
      return packr.pack({
        columns: [...frame.columns],
        data: frame.columns.map((name) => [...frame.column(name)]),
      });
    });
  }
}
