export { SqlReader } from './SqlReader.js';
export type { SqlReaderConfig } from './SqlReader.js';
export { SqlWriter } from './SqlWriter.js';
export type { SqlWriterConfig, IfExists } from './SqlWriter.js';
export { sqlAdapters, registerSqlAdapters } from './register.js';
export { toColumnType } from './mappers/ColumnTypeMapper.js';
