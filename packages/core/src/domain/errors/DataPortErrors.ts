import type { AdapterKind } from '../ports/DataAdapter.js';

/** Machine-readable error codes, one per failure class. */
export type DataPortErrorCode = 'CONFIGURATION' | 'TYPE_MISMATCH' | 'NO_ADAPTER' | 'AMBIGUOUS_ADAPTER' | 'CODEC';

/** Operation during which a codec failed. */
export type CodecOperation = 'load' | 'save';

/** A single invalid configuration field. */
export interface ConfigurationIssue {
  /** Dotted path of the offending field, `''` for the object itself. */
  readonly path: string;
  readonly message: string;
}

/**
 * Base class for every error raised by frameport.
 *
 * Each subclass carries the format identifier it concerns, so callers can tell
 * a wrong adapter choice from bad data or bad configuration without parsing messages.
 */
export abstract class DataPortError extends Error {
  abstract readonly code: DataPortErrorCode;
  readonly format: string;
  readonly details: Readonly<Record<string, unknown>>;

  protected constructor(format: string, message: string, details: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.format = format;
    this.details = details;
  }
}

/** Adapter construction fields are missing or invalid for the declared format. */
export class ConfigurationError extends DataPortError {
  readonly code = 'CONFIGURATION';
  readonly issues: readonly ConfigurationIssue[];
  /** Representation being loaded or saved, when the error arose during dispatch. */
  readonly typeId?: string;

  constructor(format: string, message: string, issues: readonly ConfigurationIssue[] = [], typeId?: string) {
    super(format, message, typeId === undefined ? { issues } : { issues, typeId });
    this.issues = issues;
    if (typeId !== undefined) this.typeId = typeId;
  }

  /** The same error, naming the representation the adapter was constructed for. */
  forType(typeId: string): ConfigurationError {
    return new ConfigurationError(this.format, `${this.message} (type '${typeId}')`, this.issues, typeId);
  }
}

/** The requested or supplied in-memory representation is not one the adapter declares. */
export class TypeMismatchError extends DataPortError {
  readonly code = 'TYPE_MISMATCH';
  readonly kind: AdapterKind;
  readonly typeId: string;
  readonly applicableTypes: readonly string[];

  constructor(format: string, kind: AdapterKind, typeId: string, applicableTypes: readonly string[]) {
    const verb = kind === 'reader' ? 'produce' : 'accept';
    super(
      format,
      `${format} ${kind} cannot ${verb} '${typeId}'; applicable types: ${applicableTypes.join(', ')}`,
      { kind, typeId, applicableTypes },
    );
    this.kind = kind;
    this.typeId = typeId;
    this.applicableTypes = applicableTypes;
  }
}

/** No registered adapter matches the `(kind, format, type)` key. */
export class NoAdapterFoundError extends DataPortError {
  readonly code = 'NO_ADAPTER';
  readonly kind: AdapterKind;
  readonly typeId: string;
  readonly availableTypes: readonly string[];

  constructor(format: string, kind: AdapterKind, typeId: string, availableTypes: readonly string[]) {
    const available =
      availableTypes.length > 0 ? `available types: ${availableTypes.join(', ')}` : `no ${kind} is registered for it`;
    super(format, `No ${kind} registered for format '${format}' and type '${typeId}' (${available})`, {
      kind,
      typeId,
      availableTypes,
    });
    this.kind = kind;
    this.typeId = typeId;
    this.availableTypes = availableTypes;
  }
}

/** Two adapter classes claim the same `(kind, format, type)` key. Raised at registration. */
export class AmbiguousAdapterError extends DataPortError {
  readonly code = 'AMBIGUOUS_ADAPTER';
  readonly kind: AdapterKind;
  readonly typeId: string;
  readonly existing: string;
  readonly incoming: string;

  constructor(format: string, kind: AdapterKind, typeId: string, existing: string, incoming: string) {
    super(
      format,
      `Cannot register ${incoming}: ${existing} already handles ${kind} '${format}' for type '${typeId}'`,
      { kind, typeId, existing, incoming },
    );
    this.kind = kind;
    this.typeId = typeId;
    this.existing = existing;
    this.incoming = incoming;
  }
}

/** The external encode/decode call (or the transport feeding it) failed. The original error is `cause`. */
export class CodecError extends DataPortError {
  readonly code = 'CODEC';
  readonly operation: CodecOperation;
  readonly adapter: string;
  readonly typeId: string;

  constructor(format: string, operation: CodecOperation, adapter: string, typeId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(format, `${adapter} failed to ${operation} ${format} data as '${typeId}': ${reason}`, { operation, adapter, typeId }, cause);
    this.operation = operation;
    this.adapter = adapter;
    this.typeId = typeId;
  }
}

/** Type guard for any frameport error. */
export function isDataPortError(value: unknown): value is DataPortError {
  return value instanceof DataPortError;
}
