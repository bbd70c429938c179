// Registration
export { fileAdapters, registerFileFormats, createDefaultRegistry } from './register.js';

// CSV (PapaParse)
export { CsvReader } from './infrastructure/csv/CsvReader.js';
export type { CsvReaderConfig } from './infrastructure/csv/CsvReader.js';
export { CsvWriter } from './infrastructure/csv/CsvWriter.js';
export type { CsvWriterConfig } from './infrastructure/csv/CsvWriter.js';

// JSON / YAML
export { JsonReader } from './infrastructure/json/JsonReader.js';
export type { JsonReaderConfig } from './infrastructure/json/JsonReader.js';
export { JsonWriter } from './infrastructure/json/JsonWriter.js';
export type { JsonWriterConfig } from './infrastructure/json/JsonWriter.js';
export { YamlReader } from './infrastructure/yaml/YamlReader.js';
export type { YamlReaderConfig } from './infrastructure/yaml/YamlReader.js';
export { YamlWriter } from './infrastructure/yaml/YamlWriter.js';
export type { YamlWriterConfig } from './infrastructure/yaml/YamlWriter.js';
export { ORIENTS, frameToDocument, documentToFrame, detectOrient } from './domain/services/Orient.js';
export type { Orient } from './domain/services/Orient.js';

// XML / HTML (zero dependencies)
export { XmlReader } from './infrastructure/xml/XmlReader.js';
export type { XmlReaderConfig } from './infrastructure/xml/XmlReader.js';
export { XmlWriter } from './infrastructure/xml/XmlWriter.js';
export type { XmlWriterConfig } from './infrastructure/xml/XmlWriter.js';
export { HtmlReader } from './infrastructure/html/HtmlReader.js';
export type { HtmlReaderConfig } from './infrastructure/html/HtmlReader.js';
export { HtmlWriter } from './infrastructure/html/HtmlWriter.js';
export type { HtmlWriterConfig } from './infrastructure/html/HtmlWriter.js';

// Binary
export { MsgpackReader } from './infrastructure/msgpack/MsgpackReader.js';
export type { MsgpackReaderConfig } from './infrastructure/msgpack/MsgpackReader.js';
export { MsgpackWriter } from './infrastructure/msgpack/MsgpackWriter.js';
export type { MsgpackWriterConfig } from './infrastructure/msgpack/MsgpackWriter.js';
export { FeatherReader } from './infrastructure/feather/FeatherReader.js';
export type { FeatherReaderConfig } from './infrastructure/feather/FeatherReader.js';
export { FeatherWriter } from './infrastructure/feather/FeatherWriter.js';
export type { FeatherWriterConfig } from './infrastructure/feather/FeatherWriter.js';
export { ParquetReader } from './infrastructure/parquet/ParquetReader.js';
export type { ParquetReaderConfig } from './infrastructure/parquet/ParquetReader.js';
export { ParquetWriter } from './infrastructure/parquet/ParquetWriter.js';
export type { ParquetWriterConfig } from './infrastructure/parquet/ParquetWriter.js';

// Shared helpers
export { inferColumn, formatCell, isBigIntColumn } from './domain/services/TypeInference.js';
