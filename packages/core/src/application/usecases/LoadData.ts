import type { TypeId } from '../../domain/model/TypeId.js';
import type { LoadResult } from '../../domain/ports/DataAdapter.js';
import { configureAdapter } from '../../domain/services/AdapterGuards.js';
import type { DataPortContext } from '../DataPortContext.js';

/** Use case: resolve the reader for `(format, type)`, construct it, load once. */
export class LoadData {
  constructor(private readonly ctx: DataPortContext) {}

  async execute<T extends TypeId>(format: string, type: T, config: unknown): Promise<LoadResult<T>> {
    const startedAt = performance.now();
    try {
      const adapterClass = this.ctx.registry.resolveReader(format, type);
      const reader = configureAdapter(adapterClass, config, type);
      const result = await reader.load(type);
      const durationMs = performance.now() - startedAt;

      this.ctx.logger.debug('load completed', {
        format,
        typeId: type,
        adapter: adapterClass.name,
        rows: result.metadata.dataframeMetadata.rows,
        durationMs,
      });
      this.ctx.eventBus.emit({
        type: 'load:completed',
        format,
        typeId: type,
        adapter: adapterClass.name,
        metadata: result.metadata,
        durationMs,
        timestamp: Date.now(),
      });
      return result;
    } catch (error) {
      this.ctx.reportFailure('load', format, type, error);
      throw error;
    }
  }
}
