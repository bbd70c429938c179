import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { ConfigurationError } from './domain/errors/DataPortErrors.js';
import type { ResultMetadata } from './domain/model/ResultMetadata.js';
import type { AnyData, TypeId } from './domain/model/TypeId.js';
import type { LoadResult } from './domain/ports/DataAdapter.js';
import type { AdapterRegistry } from './domain/services/AdapterRegistry.js';
import { DataPortContext } from './application/DataPortContext.js';
import { EventBus } from './application/EventBus.js';
import { LoadData } from './application/usecases/LoadData.js';
import { SaveData } from './application/usecases/SaveData.js';
import { detectFormat } from './infrastructure/files/detectFormat.js';
import { getDefaultLogger } from './infrastructure/logging/Logger.js';
import type { Logger } from './infrastructure/logging/Logger.js';

/** Collaborators of a {@link DataPort}. */
export interface DataPortConfig {
  /** Adapters to dispatch to. Usually sealed after start-up. */
  readonly registry: AdapterRegistry;
  /** Default: the shared pino logger. */
  readonly logger?: Logger;
  /** Default: a private bus. */
  readonly events?: EventBus;
}

/** Adapter configuration without the `path` field, which `loadFile`/`saveFile` fill in. */
export type FileOptions = Readonly<Record<string, unknown>>;

/**
 * Facade that turns `(format, type, config)` into one adapter call.
 *
 * Each call resolves the adapter class from the registry, constructs a fresh
 * instance from `config` and runs it once. Errors reach the caller unchanged,
 * after an `operation:failed` event.
 *
 * @example
 * ```typescript
 * const port = new DataPort({ registry: createDefaultRegistry().seal() });
 * const { data, metadata } = await port.loadFile('people.csv', 'records');
 * await port.save('json', data, { path: 'people.json', indent: 2 });
 * ```
 */
export class DataPort {
  private readonly ctx: DataPortContext;

  constructor(config: DataPortConfig) {
    const logger = config.logger ?? getDefaultLogger();
    this.ctx = new DataPortContext(config.registry, config.events ?? new EventBus(logger), logger);
  }

  /** Load a dataset of `format`, materialized as `type`. */
  async load<T extends TypeId>(format: string, type: T, config: unknown): Promise<LoadResult<T>> {
    return new LoadData(this.ctx).execute(format, type, config);
  }

  /** Save `data` as `format`. The writer is chosen by the representation of `data`. */
  async save(format: string, data: AnyData, config: unknown): Promise<ResultMetadata> {
    return new SaveData(this.ctx).execute(format, data, config);
  }

  /** `load()` with the format taken from the file extension. */
  async loadFile<T extends TypeId>(path: string, type: T, options: FileOptions = {}): Promise<LoadResult<T>> {
    return this.load(this.formatOf(path), type, { ...options, path });
  }

  /** `save()` with the format taken from the file extension. */
  async saveFile(path: string, data: AnyData, options: FileOptions = {}): Promise<ResultMetadata> {
    return this.save(this.formatOf(path), data, { ...options, path });
  }

  get registry(): AdapterRegistry {
    return this.ctx.registry;
  }

  /** Subscribe to an operation event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every operation event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  private formatOf(path: string): string {
    const format = detectFormat(path);
    if (format === null) {
      throw new ConfigurationError('unknown', `Cannot infer a format from the extension of '${path}'`);
    }
    return format;
  }
}
