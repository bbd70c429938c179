import { z } from 'zod';
import { TypeId, compactOptions, parseAdapterConfig, saveToFile } from '@frameport/core';
import type { AnyData, CodecOptions, DataWriter, ResultMetadata } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { renderHtmlTable } from './htmlCodec.js';

const schema = z.object({
  ...fileFields,
  border: z.number().int().nonnegative().default(1),
  /** Extra CSS classes; `dataframe` is always present. */
  classes: z.union([z.string(), z.array(z.string())]).optional(),
  tableId: z.string().min(1).optional(),
  header: z.boolean().default(true),
  /** Text written for missing values. */
  naRep: z.string().default('NaN'),
});

export type HtmlWriterConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Writes a single HTML `<table>` fragment. */
export class HtmlWriter implements DataWriter {
  static readonly kind = 'writer';
  static readonly format = 'html';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): HtmlWriter {
    return new HtmlWriter(parseAdapterConfig(schema, config, HtmlWriter.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: HtmlWriterConfig) {
    this.config = parseAdapterConfig(schema, config, HtmlWriter.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  savingOptions(): CodecOptions {
    const { border, classes, tableId, header, naRep } = this.config;
    return compactOptions({ encoding: this.encoding, border, classes, tableId, header, naRep });
  }

  async save(data: AnyData): Promise<ResultMetadata> {
    const { border, classes, tableId, header, naRep } = this.config;
    const extraClasses = typeof classes === 'string' ? classes.split(/\s+/).filter(Boolean) : (classes ?? []);
    return saveToFile(
      HtmlWriter,
      this.config.path,
      data,
      (frame) =>
        renderHtmlTable(
          frame.columns,
          frame.toRecords().map((row) => frame.columns.map((name) => row[name])),
          { border, classes: extraClasses, tableId, header, naRep },
        ),
      this.encoding,
    );
  }
}
