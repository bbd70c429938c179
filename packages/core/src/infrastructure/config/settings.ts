import { z } from 'zod';
import { parseAdapterConfig } from '../../domain/services/AdapterConfig.js';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const ENCODINGS = [
  'ascii',
  'utf8',
  'utf-8',
  'utf16le',
  'ucs2',
  'ucs-2',
  'base64',
  'base64url',
  'latin1',
  'binary',
  'hex',
] as const satisfies readonly BufferEncoding[];

/** Zod schema for a Node.js text encoding name. */
export const encodingSchema = z.enum(ENCODINGS);

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Process-wide settings read from the environment. */
export interface Settings {
  readonly logLevel: LogLevel;
  /** Encoding file adapters use when their configuration names none. */
  readonly defaultEncoding: BufferEncoding;
}

const settingsSchema = z.object({
  FRAMEPORT_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  FRAMEPORT_DEFAULT_ENCODING: encodingSchema.default('utf-8'),
});

/**
 * Read settings from `env` (default `process.env`).
 *
 * @throws ConfigurationError (format `settings`) when a variable holds an invalid value.
 */
export function loadSettings(env: Readonly<Record<string, string | undefined>> = process.env): Settings {
  const parsed = parseAdapterConfig(settingsSchema, env, 'settings');
  return {
    logLevel: parsed.FRAMEPORT_LOG_LEVEL,
    defaultEncoding: parsed.FRAMEPORT_DEFAULT_ENCODING,
  };
}

let cached: Settings | null = null;

/** Settings for the current process, read once. */
export function getSettings(): Settings {
  cached ??= loadSettings();
  return cached;
}

/** Forget cached settings so the next `getSettings()` re-reads the environment. */
export function resetSettings(): void {
  cached = null;
}
