import type { AdapterClass, AdapterRegistry } from '@frameport/core';
import { SqlReader } from './SqlReader.js';
import { SqlWriter } from './SqlWriter.js';

export const sqlAdapters: readonly AdapterClass[] = [SqlReader, SqlWriter];

/** Add the `sql` reader and writer to an existing registry. */
export function registerSqlAdapters(registry: AdapterRegistry): AdapterRegistry {
  return registry.registerAll(sqlAdapters);
}
