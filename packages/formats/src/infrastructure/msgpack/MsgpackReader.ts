import { Unpackr } from 'msgpackr';
import { z } from 'zod';
import { DataFrame, TypeId, compactOptions, loadFromFile, parseAdapterConfig } from '@frameport/core';
import type { CodecOptions, DataReader, DataRecord, LoadResult } from '@frameport/core';

const schema = z.object({
  path: z.string().min(1, 'path must not be empty'),
  /** Decode maps as plain objects rather than `Map`s. */
  mapsAsObjects: z.boolean().default(true),
});

export type MsgpackReaderConfig = z.input<typeof schema>;

const TYPES: readonly TypeId[] = [TypeId.DATAFRAME, TypeId.RECORDS];

/**
 * Reads MessagePack written by {@link MsgpackWriter} (`{ columns, data }` with
 * one array per column) or a plain array of record maps.
 */
export class MsgpackReader implements DataReader {
  static readonly kind = 'reader';
  static readonly format = 'msgpack';
  static readonly configSchema = schema;

  static applicableTypes(): readonly TypeId[] {
    return TYPES;
  }

  static fromConfig(config: unknown): MsgpackReader {
    return new MsgpackReader(parseAdapterConfig(schema, config, MsgpackReader.format));
  }

  private readonly config: z.output<typeof schema>;

  constructor(config: MsgpackReaderConfig) {
    this.config = parseAdapterConfig(schema, config, MsgpackReader.format);
  }

  loadingOptions(): CodecOptions {
    return compactOptions({ mapsAsObjects: this.config.mapsAsObjects });
  }

  async load<T extends TypeId>(type: T): Promise<LoadResult<T>> {
    return loadFromFile(MsgpackReader, this.config.path, type, (bytes) => {
      const unpackr = new Unpackr({ mapsAsObjects: this.config.mapsAsObjects });
      return decodeDocument(unpackr.unpack(bytes));
    });
  }
}

function decodeDocument(raw: unknown): DataFrame {
  const document = asObject(raw);
  if (Array.isArray(raw)) {
    return DataFrame.fromRecords(
      raw.map((item, index) => {
        const record = asObject(item);
        if (!record) throw new Error(`item ${String(index)} is not a map`);
        return record;
      }),
    );
  }
  if (!document || !Array.isArray(document.columns) || !Array.isArray(document.data)) {
    throw new Error('expected { columns, data } or an array of maps');
  }

  const names = document.columns.map(String);
  const data = document.data;
  if (data.length !== names.length) {
    throw new Error(`${String(names.length)} column names but ${String(data.length)} data arrays`);
  }
  const columns: Record<string, unknown[]> = {};
  names.forEach((name, i) => {
    const values: unknown = data[i];
    if (!Array.isArray(values)) throw new Error(`data for column '${name}' is not an array`);
    columns[name] = values;
  });
  return DataFrame.fromColumns(columns, names);
}

/** Plain objects pass through; `Map`s (when `mapsAsObjects` is off) are converted. */
function asObject(value: unknown): DataRecord | null {
  if (value instanceof Map) {
    const record: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      record[String(key)] = entry;
    }
    return record;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return null;
}
