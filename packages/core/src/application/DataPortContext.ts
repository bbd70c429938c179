import type { CodecOperation } from '../domain/errors/DataPortErrors.js';
import { isDataPortError } from '../domain/errors/DataPortErrors.js';
import type { AdapterRegistry } from '../domain/services/AdapterRegistry.js';
import type { Logger } from '../infrastructure/logging/Logger.js';
import type { EventBus } from './EventBus.js';

/** Collaborators shared by the load and save use cases. */
export class DataPortContext {
  constructor(
    readonly registry: AdapterRegistry,
    readonly eventBus: EventBus,
    readonly logger: Logger,
  ) {}

  /** Log a failed operation and publish `operation:failed`. The caller re-throws. */
  reportFailure(operation: CodecOperation, format: string, typeId: string, error: unknown): void {
    const code = isDataPortError(error) ? error.code : 'UNKNOWN';
    const message = error instanceof Error ? error.message : String(error);

    this.logger.error(`${operation} failed`, error, { format, typeId, code });
    this.eventBus.emit({
      type: 'operation:failed',
      operation,
      format,
      typeId,
      code,
      error: message,
      timestamp: Date.now(),
    });
  }
}
