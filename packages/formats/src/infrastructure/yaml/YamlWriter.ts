import { stringify } from 'yaml';
import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataWriter, ResultMetadata } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { ORIENTS, frameToDocument } from '../../domain/services/Orient.js';
import { toPlainFrame } from '../../domain/services/PlainValues.js';

const schema = z.object({
  ...fileFields,
  orient: z.enum(ORIENTS).default('records'),
  indent: z.number().int().min(1).max(10).default(2),
  /** Fold long strings at this width; `0` disables folding. */
  lineWidth: z.number().int().nonnegative().default(80),
});

export type YamlWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Writes one YAML document. Dates are written as ISO strings. */
export class YamlWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'yaml';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): YamlWriter {
    return new YamlWriter(parseAdapterConfig(schema, config, YamlWriter.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: YamlWriterConfig) {
    this.config = parseAdapterConfig(schema, config, YamlWriter.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  savingOptions(): CodecOptions {
    const { orient, indent, lineWidth } = this.config;
    return compactOptions({ encoding: this.encoding, orient, indent, lineWidth });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    const { orient, indent, lineWidth } = this.config;
    return saveToFile(
      YamlWriter,
      this.config.path,
      data,
      (frame) => stringify(frameToDocument(toPlainFrame(frame), orient), { indent, lineWidth }),
      this.encoding,
    );
  }
}
