import type { ZodTypeAny, z } from 'zod';
import { ConfigurationError } from '../errors/DataPortErrors.js';
import type { ConfigurationIssue } from '../errors/DataPortErrors.js';

/**
 * Validate adapter configuration against its schema, applying defaults.
 *
 * @throws ConfigurationError listing every invalid field.
 */
export function parseAdapterConfig<S extends ZodTypeAny>(schema: S, input: unknown, format: string): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues: ConfigurationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
  const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');

  throw new ConfigurationError(format, `Invalid ${format} adapter configuration: ${summary}`, issues);
}

/**
 * Drop `undefined` entries so an option map only carries keys the codec call
 * should see. The result is frozen.
 */
export function compactOptions<T extends Record<string, unknown>>(options: T): Readonly<Partial<T>> {
  const result: Partial<T> = {};
  for (const key in options) {
    if (Object.hasOwn(options, key) && options[key] !== undefined) {
      result[key] = options[key];
    }
  }
  return Object.freeze(result);
}
