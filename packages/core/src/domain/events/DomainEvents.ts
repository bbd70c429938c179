import type { CodecOperation } from '../errors/DataPortErrors.js';
import type { ResultMetadata } from '../model/ResultMetadata.js';
import type { TypeId } from '../model/TypeId.js';

/** Emitted after a reader returned data. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly format: string;
  readonly typeId: TypeId;
  readonly adapter: string;
  readonly metadata: ResultMetadata;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted after a writer persisted data. */
export interface SaveCompletedEvent {
  readonly type: 'save:completed';
  readonly format: string;
  readonly typeId: TypeId;
  readonly adapter: string;
  readonly metadata: ResultMetadata;
  readonly durationMs: number;
  readonly timestamp: number;
}

/**
 * Emitted when a load or save throws, whatever the stage (resolution,
 * configuration, type check, codec). The error is re-thrown to the caller.
 */
export interface OperationFailedEvent {
  readonly type: 'operation:failed';
  readonly operation: CodecOperation;
  readonly format: string;
  /** Requested representation on load; detected one on save, `'unknown'` when undetectable. */
  readonly typeId: string;
  /** `DataPortError.code`, or `'UNKNOWN'` for foreign errors. */
  readonly code: string;
  readonly error: string;
  readonly timestamp: number;
}

export type DomainEvent = LoadCompletedEvent | SaveCompletedEvent | OperationFailedEvent;

export type EventType = DomainEvent['type'];

export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
