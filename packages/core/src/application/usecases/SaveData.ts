import { TypeMismatchError } from '../../domain/errors/DataPortErrors.js';
import type { ResultMetadata } from '../../domain/model/ResultMetadata.js';
import { detectTypeId } from '../../domain/model/TypeId.js';
import type { AnyData } from '../../domain/model/TypeId.js';
import { configureAdapter } from '../../domain/services/AdapterGuards.js';
import type { DataPortContext } from '../DataPortContext.js';

/** Use case: detect the representation of `data`, resolve the matching writer, save once. */
export class SaveData {
  constructor(private readonly ctx: DataPortContext) {}

  async execute(format: string, data: AnyData, config: unknown): Promise<ResultMetadata> {
    const startedAt = performance.now();
    const typeId = detectTypeId(data);
    try {
      if (typeId === null) {
        throw new TypeMismatchError(format, 'writer', 'unknown', this.ctx.registry.applicableTypes('writer', format));
      }

      const adapterClass = this.ctx.registry.resolveWriter(format, typeId);
      const writer = configureAdapter(adapterClass, config, typeId);
      const metadata = await writer.save(data);
      const durationMs = performance.now() - startedAt;

      this.ctx.logger.debug('save completed', {
        format,
        typeId,
        adapter: adapterClass.name,
        rows: metadata.dataframeMetadata.rows,
        durationMs,
      });
      this.ctx.eventBus.emit({
        type: 'save:completed',
        format,
        typeId,
        adapter: adapterClass.name,
        metadata,
        durationMs,
        timestamp: Date.now(),
      });
      return metadata;
    } catch (error) {
      this.ctx.reportFailure('save', format, typeId ?? 'unknown', error);
      throw error;
    }
  }
}
