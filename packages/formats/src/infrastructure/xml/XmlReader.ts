import { z } from 'zod';
import { DataFrame, TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, LoadResult } from '@frameport/core';
import { fileFields, resolveEncoding } from '../../domain/model/FileConfig.js';
import { inferColumn } from '../../domain/services/TypeInference.js';
import { parseXmlRecords } from './xmlCodec.js';

const schema = z.object({
  ...fileFields,
  /** Element that wraps each record. Default: the first child of the root. */
  recordTag: z.string().min(1).optional(),
  /** Convert numeric and boolean columns. When off, every value stays text. */
  inferTypes: z.boolean().default(true),
});

export type XmlReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/** Reads flat record-oriented XML. */
export class XmlReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'xml';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): XmlReader {
    return new XmlReader(parseAdapterConfig(schema, config, XmlReader.format));
  }

  private readonly config: z.output<typeof schema>;
  private readonly encoding: BufferEncoding;

  constructor(config: XmlReaderConfig) {
    this.config = parseAdapterConfig(schema, config, XmlReader.format);
    this.encoding = resolveEncoding(this.config.encoding);
  }

  loadingOptions(): CodecOptions {
    return compactOptions({
      encoding: this.encoding,
      recordTag: this.config.recordTag,
      inferTypes: this.config.inferTypes,
    });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(XmlReader, this.config.path, type, (bytes) => this.decode(bytes.toString(this.encoding)));
  }

  private decode(text: string): DataFrame {
    const records = parseXmlRecords(text, this.config.recordTag);

    const names: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const key of record.keys()) {
        if (!seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }

    const columns: Record<string, unknown[]> = {};
    for (const name of names) {
      const values = records.map((record) => record.get(name) ?? null);
      columns[name] = this.config.inferTypes ? inferColumn(values) : values;
    }
    return DataFrame.fromColumns(columns, names);
  }
}
