import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataWriter, ResultMetadata } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { renderXml } from './xmlCodec.js';

const schema = z.object({
  ...fileFields,
  rootName: z.string().min(1).default('data'),
  rowName: z.string().min(1).default('row'),
  xmlDeclaration: z.boolean().default(true),
  /** Indent nested elements, one per line. */
  pretty: z.boolean().default(true),
});

export type XmlWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Writes one element per row under a single root. */
export class XmlWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'xml';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): XmlWriter {
    return new XmlWriter(parseAdapterConfig(schema, config, XmlWriter.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: XmlWriterConfig) {
    this.config = parseAdapterConfig(schema, config, XmlWriter.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  savingOptions(): CodecOptions {
    const { rootName, rowName, xmlDeclaration, pretty } = this.config;
    return compactOptions({ encoding: this.encoding, rootName, rowName, xmlDeclaration, pretty });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    const { rootName, rowName, xmlDeclaration, pretty } = this.config;
    return saveToFile(
      XmlWriter,
      this.config.path,
      data,
      (frame) =>
        renderXml(
          frame.columns,
          frame.toRecords().map((row) => frame.columns.map((name) => row[name])),
          { rootName, rowName, xmlDeclaration, pretty, encoding: this.encoding },
        ),
      this.encoding,
    );
  }
}
