import type { DataFrame } from '../../domain/model/DataFrame.js';
import type { ResultMetadata } from '../../domain/model/ResultMetadata.js';
import { materialize } from '../../domain/model/TypeId.js';
import type { TypeId } from '../../domain/model/TypeId.js';
import type { LoadResult } from '../../domain/ports/DataAdapter.js';
import { assertLoadable, assertSavable, withCodec } from '../../domain/services/AdapterGuards.js';
import type { AdapterDescriptor } from '../../domain/services/AdapterGuards.js';
import { buildResultMetadata, describeDataFrame } from '../../domain/services/MetadataBuilder.js';
import { FileTransport } from './FileTransport.js';

/** Turns the raw file bytes into a frame. */
export type FileDecoder = (bytes: Buffer) => DataFrame | Promise<DataFrame>;

/** Turns a frame into the full file body. */
export type FileEncoder = (frame: DataFrame) => Uint8Array | string | Promise<Uint8Array | string>;

/**
 * Shared load path of file readers: applicability check, one read, one decode,
 * then the metadata envelope.
 *
 * Read and decode failures both surface as `CodecError`.
 */
export async function loadFromFile<T extends TypeId>(
  adapter: AdapterDescriptor,
  path: string,
  type: T,
  decode: FileDecoder,
): Promise<LoadResult<T>> {
  assertLoadable(adapter, type);

  const transport = new FileTransport(path);
  const frame = await withCodec(adapter, 'load', type, async () => decode(await transport.read()));
  const data = materialize(frame, type);
  const metadata = buildResultMetadata(await transport.describe(), describeDataFrame(frame));
  return { data, metadata };
}

/**
 * Shared save path of file writers. The body is encoded fully in memory and
 * written in a single call; string bodies are written with `encoding`.
 */
export async function saveToFile(
  adapter: AdapterDescriptor,
  path: string,
  data: unknown,
  encode: FileEncoder,
  encoding?: BufferEncoding,
): Promise<ResultMetadata> {
  const { typeId, frame } = assertSavable(adapter, data);

  const transport = new FileTransport(path);
  await withCodec(adapter, 'save', typeId, async () => {
    const body = await encode(frame);
    await transport.write(body, encoding);
  });
  return buildResultMetadata(await transport.describe(), describeDataFrame(frame));
}
