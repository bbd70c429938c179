import { parse } from 'yaml';
import { z } from 'zod';
import { TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, LoadResult } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { ORIENTS, documentToFrame } from '../../domain/services/Orient.js';

const schema = z.object({
  ...fileFields,
  /** Document layout. Default: detected from the document. */
  orient: z.enum(ORIENTS).optional(),
});

export type YamlReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Reads a single YAML document laid out like the JSON orients. */
export class YamlReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'yaml';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): YamlReader {
    return new YamlReader(parseAdapterConfig(schema, config, YamlReader.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: YamlReaderConfig) {
    this.config = parseAdapterConfig(schema, config, YamlReader.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  loadingOptions(): CodecOptions {
    return compactOptions({ encoding: this.encoding, orient: this.config.orient });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(YamlReader, this.config.path, type, (bytes) => {
      const document: unknown = parse(bytes.toString(this.encoding));
      return documentToFrame(document, this.config.orient);
    });
  }
}
