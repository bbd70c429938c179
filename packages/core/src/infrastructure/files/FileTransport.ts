import { readFile, stat, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { FileTransportInfo } from '../../domain/services/MetadataBuilder.js';

/**
 * Byte-level access to one local file. Node.js only.
 *
 * Reads and writes the whole file in a single call; there is no partial or
 * chunked I/O.
 */
export class FileTransport {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async read(): Promise<Buffer> {
    return readFile(this.path);
  }

  /** Write `bytes` in one call, replacing any existing file. */
  async write(bytes: Uint8Array | string, encoding?: BufferEncoding): Promise<void> {
    if (typeof bytes === 'string') {
      await writeFile(this.path, bytes, { encoding: encoding ?? 'utf-8' });
    } else {
      await writeFile(this.path, bytes);
    }
  }

  /** Collect path, size and modification time for the metadata envelope. */
  async describe(): Promise<FileTransportInfo> {
    const stats = await stat(this.path);
    return {
      kind: 'file',
      path: this.path,
      size: stats.size,
      lastModified: stats.mtimeMs,
      timestamp: Date.now(),
    };
  }
}
