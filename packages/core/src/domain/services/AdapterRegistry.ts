import {
  AmbiguousAdapterError,
  ConfigurationError,
  NoAdapterFoundError,
} from '../errors/DataPortErrors.js';
import { isTypeId } from '../model/TypeId.js';
import type { TypeId } from '../model/TypeId.js';
import type { AdapterClass, AdapterKind, ReaderClass, WriterClass } from '../ports/DataAdapter.js';
import type { Logger } from '../../infrastructure/logging/Logger.js';

/**
 * Process-wide table of adapter classes keyed by `(kind, format, type)`.
 *
 * Built once at start-up, then read-only: `seal()` closes registration.
 * Every `(kind, format, type)` key maps to exactly one class; a second class
 * claiming the same key is rejected when it registers, so resolution never
 * has to choose.
 */
export class AdapterRegistry {
  private readonly readers = new Map<string, ReaderClass>();
  private readonly writers = new Map<string, WriterClass>();
  private sealed = false;
  private readonly logger: Logger | null;

  constructor(options?: { readonly logger?: Logger }) {
    this.logger = options?.logger ?? null;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Add an adapter class under each of its applicable types.
   *
   * Registering the same class twice is a no-op. Nothing is inserted when any
   * of its keys conflicts with another class.
   *
   * @throws AmbiguousAdapterError when another class already owns a `(kind, format, type)` key.
   * @throws ConfigurationError when the class declares no valid types or the registry is sealed.
   */
  register(adapter: AdapterClass): this {
    if (this.sealed) {
      throw new ConfigurationError(adapter.format, `Cannot register ${adapter.name}: the adapter registry is sealed`);
    }
    if (adapter.format.trim() === '') {
      throw new ConfigurationError(adapter.format, `${adapter.name} declares an empty format identifier`);
    }

    const types = adapter.applicableTypes();
    if (types.length === 0) {
      throw new ConfigurationError(adapter.format, `${adapter.name} declares no applicable types`);
    }
    const unknown = types.filter((type) => !isTypeId(type));
    if (unknown.length > 0) {
      throw new ConfigurationError(adapter.format, `${adapter.name} declares unknown types: ${unknown.join(', ')}`);
    }

    for (const type of types) {
      const existing = this.lookup(adapter.kind, adapter.format, type);
      if (existing && existing !== adapter) {
        throw new AmbiguousAdapterError(adapter.format, adapter.kind, type, existing.name, adapter.name);
      }
    }

    for (const type of types) {
      const key = tableKey(adapter.format, type);
      if (adapter.kind === 'reader') {
        this.readers.set(key, adapter);
      } else {
        this.writers.set(key, adapter);
      }
    }

    this.logger?.trace('Registered adapter', {
      adapter: adapter.name,
      kind: adapter.kind,
      format: adapter.format,
      types,
    });
    return this;
  }

  registerAll(adapters: Iterable<AdapterClass>): this {
    for (const adapter of adapters) {
      this.register(adapter);
    }
    return this;
  }

  /** Close registration. Later `register()` calls throw. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  /** @throws NoAdapterFoundError when no reader owns `(format, type)`. */
  resolveReader(format: string, type: TypeId): ReaderClass {
    const adapter = this.readers.get(tableKey(format, type));
    if (!adapter) {
      throw new NoAdapterFoundError(format, 'reader', type, this.applicableTypes('reader', format));
    }
    return adapter;
  }

  /** @throws NoAdapterFoundError when no writer owns `(format, type)`. */
  resolveWriter(format: string, type: TypeId): WriterClass {
    const adapter = this.writers.get(tableKey(format, type));
    if (!adapter) {
      throw new NoAdapterFoundError(format, 'writer', type, this.applicableTypes('writer', format));
    }
    return adapter;
  }

  /** Direct lookup of the class registered for `(kind, format, type)`. */
  resolve(kind: AdapterKind, format: string, type: TypeId): AdapterClass {
    return kind === 'reader' ? this.resolveReader(format, type) : this.resolveWriter(format, type);
  }

  has(kind: AdapterKind, format: string, type: TypeId): boolean {
    return this.lookup(kind, format, type) !== undefined;
  }

  /** Formats with at least one adapter of `kind` (or of either kind), sorted. */
  formats(kind?: AdapterKind): string[] {
    const formats = new Set<string>();
    const tables: ReadonlyMap<string, AdapterClass>[] = kind ? [this.tableFor(kind)] : [this.readers, this.writers];
    for (const table of tables) {
      for (const adapter of table.values()) {
        formats.add(adapter.format);
      }
    }
    return [...formats].sort();
  }

  /** Types registered for `(kind, format)`, in registration order. */
  applicableTypes(kind: AdapterKind, format: string): TypeId[] {
    const types: TypeId[] = [];
    for (const adapter of new Set(this.tableFor(kind).values())) {
      if (adapter.format === format) {
        types.push(...adapter.applicableTypes());
      }
    }
    return types;
  }

  private lookup(kind: AdapterKind, format: string, type: TypeId): AdapterClass | undefined {
    return this.tableFor(kind).get(tableKey(format, type));
  }

  private tableFor(kind: AdapterKind): ReadonlyMap<string, AdapterClass> {
    return kind === 'reader' ? this.readers : this.writers;
  }
}

function tableKey(format: string, type: TypeId): string {
  return `${format}\u0000${type}`;
}
