import { z } from 'zod';
import { DataFrame, TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, LoadResult } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { ORIENTS, documentToFrame } from '../../domain/services/Orient.js';

const schema = z
  .object({
    ...fileFields,
    /** Document layout. Default: detected from the document. */
    orient: z.enum(ORIENTS).optional(),
    /** One record object per line (NDJSON). */
    lines: z.boolean().default(false),
  })
  .refine((config) => !config.lines || config.orient === undefined || config.orient === 'records', {
    message: "lines requires orient 'records'",
    path: ['lines'],
  });

export type JsonReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Reads JSON documents or NDJSON. */
export class JsonReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'json';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): JsonReader {
    return new JsonReader(parseAdapterConfig(schema, config, JsonReader.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: JsonReaderConfig) {
    this.config = parseAdapterConfig(schema, config, JsonReader.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  loadingOptions(): CodecOptions {
    return compactOptions({ encoding: this.encoding, orient: this.config.orient, lines: this.config.lines });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(JsonReader, this.config.path, type, (bytes) => this.decode(bytes.toString(this.encoding)));
  }

  private decode(text: string): DataFrame {
    if (this.config.lines) {
      const records: unknown[] = text
        .split('\n')
        .filter((line) => line.trim() !== '')
        .map((line): unknown => JSON.parse(line));
      return documentToFrame(records, 'records');
    }
    const document: unknown = JSON.parse(text);
    return documentToFrame(document, this.config.orient);
  }
}
