import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataFrame, DataWriter, ResultMetadata } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { ORIENTS, frameToDocument } from '../../domain/services/Orient.js';
import { toPlainValue } from '../../domain/services/PlainValues.js';

const schema = z
  .object({
    ...fileFields,
    orient: z.enum(ORIENTS).default('records'),
    /** One record object per line (NDJSON). */
    lines: z.boolean().default(false),
    /** Spaces of indentation. Default: compact output. */
    indent: z.number().int().min(0).max(10).optional(),
  })
  .refine((config) => !config.lines || config.orient === 'records', {
    message: "lines requires orient 'records'",
    path: ['lines'],
  });

export type JsonWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Writes JSON documents or NDJSON. */
export class JsonWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'json';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): JsonWriter {
    return new JsonWriter(parseAdapterConfig(schema, config, JsonWriter.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: JsonWriterConfig) {
    this.config = parseAdapterConfig(schema, config, JsonWriter.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  savingOptions(): CodecOptions {
    const { orient, lines, indent } = this.config;
    return compactOptions({ encoding: this.encoding, orient, lines, indent });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    return saveToFile(JsonWriter, this.config.path, data, (frame) => this.encode(frame), this.encoding);
  }

  private encode(frame: DataFrame): string {
    if (this.config.lines) {
      return frame
        .toRecords()
        .map((record) => JSON.stringify(record, plainReplacer) + '\n')
        .join('');
    }
    return JSON.stringify(frameToDocument(frame, this.config.orient), plainReplacer, this.config.indent);
  }
}

function plainReplacer(_key: string, value: unknown): unknown {
  return toPlainValue(value);
}
