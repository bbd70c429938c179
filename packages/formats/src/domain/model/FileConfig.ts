import { z } from 'zod';
import { encodingSchema, getSettings } from '@frameport/core';

/** Fields every file adapter accepts. `path` never reaches the codec. */
export const fileFields = {
  path: z.string().min(1, 'path must not be empty'),
  encoding: encodingSchema.optional(),
};

/** The configured encoding, else the process default (`FRAMEPORT_DEFAULT_ENCODING`). */
export function resolveEncoding(encoding: BufferEncoding | undefined): BufferEncoding {
  return encoding ?? getSettings().defaultEncoding;
}
