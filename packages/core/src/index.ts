// Main entry point
export { DataPort } from './DataPort.js';
export type { DataPortConfig, FileOptions } from './DataPort.js';

// Domain model
export { DataFrame, inferDtype } from './domain/model/DataFrame.js';
export type { DataRecord, DtypeLabel } from './domain/model/DataFrame.js';
export { TypeId, isTypeId, detectTypeId, isRecordArray, toDataFrame, materialize } from './domain/model/TypeId.js';
export type { DataTypeMap, DataOf, AnyData } from './domain/model/TypeId.js';
export { isFileMetadata, isSqlMetadata } from './domain/model/ResultMetadata.js';
export type {
  ResultMetadata,
  FileResultMetadata,
  SqlResultMetadata,
  FileMetadata,
  SqlMetadata,
  DataFrameMetadata,
} from './domain/model/ResultMetadata.js';

// Errors
export {
  DataPortError,
  ConfigurationError,
  TypeMismatchError,
  NoAdapterFoundError,
  AmbiguousAdapterError,
  CodecError,
  isDataPortError,
} from './domain/errors/DataPortErrors.js';
export type { DataPortErrorCode, CodecOperation, ConfigurationIssue } from './domain/errors/DataPortErrors.js';

// Ports
export type {
  AdapterKind,
  CodecOptions,
  LoadResult,
  DataReader,
  DataWriter,
  ReaderClass,
  WriterClass,
  AdapterClass,
} from './domain/ports/DataAdapter.js';

// Domain services
export { AdapterRegistry } from './domain/services/AdapterRegistry.js';
export { parseAdapterConfig, compactOptions } from './domain/services/AdapterConfig.js';
export { assertLoadable, assertSavable, configureAdapter, withCodec } from './domain/services/AdapterGuards.js';
export type { AdapterDescriptor } from './domain/services/AdapterGuards.js';
export { buildResultMetadata, describeDataFrame } from './domain/services/MetadataBuilder.js';
export type {
  TransportInfo,
  FileTransportInfo,
  SqlTransportInfo,
  DataShapeInfo,
} from './domain/services/MetadataBuilder.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LoadCompletedEvent,
  SaveCompletedEvent,
  OperationFailedEvent,
} from './domain/events/DomainEvents.js';

// Application
export { EventBus } from './application/EventBus.js';

// Infrastructure
export { FileTransport } from './infrastructure/files/FileTransport.js';
export { loadFromFile, saveToFile } from './infrastructure/files/fileOperations.js';
export type { FileDecoder, FileEncoder } from './infrastructure/files/fileOperations.js';
export { detectFormat } from './infrastructure/files/detectFormat.js';
export { createLogger, getDefaultLogger } from './infrastructure/logging/Logger.js';
export type { Logger, LoggerOptions } from './infrastructure/logging/Logger.js';
export { loadSettings, getSettings, resetSettings, encodingSchema } from './infrastructure/config/settings.js';
export type { Settings, LogLevel } from './infrastructure/config/settings.js';
