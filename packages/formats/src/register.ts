import { AdapterRegistry } from '@frameport/core';
import type { AdapterClass, Logger } from '@frameport/core';
import { CsvReader } from './infrastructure/csv/CsvReader.js';
import { CsvWriter } from './infrastructure/csv/CsvWriter.js';
import { FeatherReader } from './infrastructure/feather/FeatherReader.js';
import { FeatherWriter } from './infrastructure/feather/FeatherWriter.js';
import { HtmlReader } from './infrastructure/html/HtmlReader.js';
import { HtmlWriter } from './infrastructure/html/HtmlWriter.js';
import { JsonReader } from './infrastructure/json/JsonReader.js';
import { JsonWriter } from './infrastructure/json/JsonWriter.js';
import { MsgpackReader } from './infrastructure/msgpack/MsgpackReader.js';
import { MsgpackWriter } from './infrastructure/msgpack/MsgpackWriter.js';
import { ParquetReader } from './infrastructure/parquet/ParquetReader.js';
import { ParquetWriter } from './infrastructure/parquet/ParquetWriter.js';
import { XmlReader } from './infrastructure/xml/XmlReader.js';
import { XmlWriter } from './infrastructure/xml/XmlWriter.js';
import { YamlReader } from './infrastructure/yaml/YamlReader.js';
import { YamlWriter } from './infrastructure/yaml/YamlWriter.js';

/** Every file adapter in this package, readers before writers per format. */
export const fileAdapters: readonly AdapterClass[] = [
  CsvReader,
  CsvWriter,
  JsonReader,
  JsonWriter,
  YamlReader,
  YamlWriter,
  XmlReader,
  XmlWriter,
  HtmlReader,
  HtmlWriter,
  MsgpackReader,
  MsgpackWriter,
  FeatherReader,
  FeatherWriter,
  ParquetReader,
  ParquetWriter,
];

/** Add the file adapters to an existing registry. */
export function registerFileFormats(registry: AdapterRegistry): AdapterRegistry {
  return registry.registerAll(fileAdapters);
}

/** A fresh, unsealed registry holding the file adapters. */
export function createDefaultRegistry(options?: { readonly logger?: Logger }): AdapterRegistry {
  return registerFileFormats(new AdapterRegistry(options));
}
