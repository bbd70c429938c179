import { describe, it, expect, vi } from 'vitest';
import { DataPort } from '../../src/DataPort.js';
import { EventBus } from '../../src/application/EventBus.js';
import {
  CodecError,
  ConfigurationError,
  NoAdapterFoundError,
  TypeMismatchError,
} from '../../src/domain/errors/DataPortErrors.js';
import type { OperationFailedEvent } from '../../src/domain/events/DomainEvents.js';
import { DataFrame } from '../../src/domain/model/DataFrame.js';
import { AdapterRegistry } from '../../src/domain/services/AdapterRegistry.js';
import type { Logger } from '../../src/infrastructure/logging/Logger.js';
import { createMemoryAdapters, people } from '../helpers/memoryAdapters.js';

function recordingLogger() {
  const error = vi.fn();
  const debug = vi.fn();
  const logger: Logger = {
    trace: vi.fn(),
    debug,
    info: vi.fn(),
    warn: vi.fn(),
    error,
    fatal: vi.fn(),
    child: () => logger,
  };
  return { logger, error, debug };
}

function setup() {
  const adapters = createMemoryAdapters();
  const registry = new AdapterRegistry().registerAll([adapters.MemoryReader, adapters.MemoryWriter]).seal();
  const log = recordingLogger();
  const port = new DataPort({ registry, logger: log.logger });
  return { ...adapters, port, log };
}

describe('DataPort', () => {
  it('should save then load a frame through the registry', async () => {
    const { port } = setup();

    const saved = await port.save('memory', people, { key: 'people' });
    const { data, metadata } = await port.load('memory', 'dataframe', { key: 'people' });

    expect(saved.dataframeMetadata.columnNames).toEqual(['name', 'age']);
    expect(data.equals(people)).toBe(true);
    expect(metadata.dataframeMetadata).toEqual({
      rows: 2,
      columns: 2,
      columnNames: ['name', 'age'],
      datatypes: ['object', 'int64'],
    });
  });

  it('should pick the writer by the representation of the data', async () => {
    const { port, store } = setup();

    await port.save('memory', [{ id: 1 }, { id: 2 }], { key: 'ids' });

    expect(store.get('ids')?.shape).toEqual([2, 1]);
  });

  it('should throw TypeMismatchError from load() without touching the store', async () => {
    const { MemoryReader, io, store } = setup();
    store.set('people', people);

    const reader = MemoryReader.fromConfig({ key: 'people' });

    await expect(reader.load('records')).rejects.toThrow(TypeMismatchError);
    expect(io.reads).toBe(0);
  });

  it('should report a reader-side miss as NoAdapterFoundError', async () => {
    const { port, io } = setup();

    await expect(port.load('memory', 'records', { key: 'people' })).rejects.toThrow(NoAdapterFoundError);
    expect(io.reads).toBe(0);
  });

  it('should raise ConfigurationError before any I/O', async () => {
    const { port, io } = setup();

    await expect(port.save('memory', people, { key: '' })).rejects.toThrow(ConfigurationError);
    expect(io.writes).toBe(0);
  });

  it('should name the requested type in configuration errors', async () => {
    const { port } = setup();

    const caught: unknown = await port.load('memory', 'dataframe', { key: 42 }).catch((error: unknown) => error);

    expect(caught).toBeInstanceOf(ConfigurationError);
    const error = caught instanceof ConfigurationError ? caught : null;
    expect(error?.typeId).toBe('dataframe');
    expect(error?.details).toMatchObject({ typeId: 'dataframe' });
    expect(error?.message.endsWith("(type 'dataframe')")).toBe(true);
  });

  it('should propagate codec failures unchanged and publish operation:failed', async () => {
    const { port, log } = setup();
    const failures: OperationFailedEvent[] = [];
    port.on('operation:failed', (event) => failures.push(event));

    const attempt = port.save('memory', people, { key: 'people', fail: true });

    await expect(attempt).rejects.toBeInstanceOf(CodecError);
    await expect(attempt).rejects.toThrow("MemoryWriter failed to save memory data as 'dataframe': disk full");
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({ operation: 'save', format: 'memory', typeId: 'dataframe', code: 'CODEC' });
    expect(log.error).toHaveBeenCalledOnce();
  });

  it('should publish completion events with the adapter name and metadata', async () => {
    const { port } = setup();
    const seen: string[] = [];
    port.on('save:completed', (event) => seen.push(`${event.type}:${event.adapter}:${event.metadata.dataframeMetadata.rows}`));
    port.on('load:completed', (event) => seen.push(`${event.type}:${event.adapter}:${event.typeId}`));

    await port.save('memory', people, { key: 'people' });
    await port.load('memory', 'dataframe', { key: 'people' });

    expect(seen).toEqual(['save:completed:MemoryWriter:2', 'load:completed:MemoryReader:dataframe']);
  });

  it('should log each completed operation at debug', async () => {
    const { port, log } = setup();

    await port.save('memory', people, { key: 'people' });

    expect(log.debug).toHaveBeenCalledWith(
      'save completed',
      expect.objectContaining({ format: 'memory', typeId: 'dataframe', adapter: 'MemoryWriter', rows: 2 }),
    );
  });

  it('should keep going when a subscriber throws', async () => {
    const { port } = setup();
    port.onAny(() => {
      throw new Error('subscriber broke');
    });

    await expect(port.save('memory', people, { key: 'people' })).resolves.toMatchObject({
      sqlMetadata: { rows: 2, tableName: 'people' },
    });
  });

  it('should stop delivering after off()', async () => {
    const { port } = setup();
    const handler = vi.fn();
    port.on('save:completed', handler).off('save:completed', handler);

    await port.save('memory', people, { key: 'people' });

    expect(handler).not.toHaveBeenCalled();
  });

  it('should share an injected event bus', async () => {
    const adapters = createMemoryAdapters();
    const registry = new AdapterRegistry().register(adapters.MemoryWriter);
    const events = new EventBus(recordingLogger().logger);
    const handler = vi.fn();
    events.on('save:completed', handler);

    await new DataPort({ registry, events, logger: recordingLogger().logger }).save('memory', DataFrame.empty(), {
      key: 'empty',
    });

    expect(handler).toHaveBeenCalledOnce();
  });

  it('should refuse a file path whose extension names no format', async () => {
    const { port } = setup();

    await expect(port.loadFile('archive.orc', 'dataframe')).rejects.toThrow(
      "Cannot infer a format from the extension of 'archive.orc'",
    );
  });
});
