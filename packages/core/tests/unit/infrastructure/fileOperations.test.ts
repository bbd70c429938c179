import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CodecError, TypeMismatchError } from '../../../src/domain/errors/DataPortErrors.js';
import { DataFrame } from '../../../src/domain/model/DataFrame.js';
import { isFileMetadata } from '../../../src/domain/model/ResultMetadata.js';
import type { AdapterDescriptor } from '../../../src/domain/services/AdapterGuards.js';
import { loadFromFile, saveToFile } from '../../../src/infrastructure/files/fileOperations.js';

const lineReader: AdapterDescriptor = {
  name: 'LineReader',
  format: 'lines',
  kind: 'reader',
  applicableTypes: () => ['dataframe'],
};

const lineWriter: AdapterDescriptor = {
  name: 'LineWriter',
  format: 'lines',
  kind: 'writer',
  applicableTypes: () => ['dataframe'],
};

function decodeLines(bytes: Buffer): DataFrame {
  const lines = bytes.toString('utf-8').split('\n').filter((line) => line !== '');
  return DataFrame.fromColumns({ line: lines });
}

function encodeLines(frame: DataFrame): string {
  return frame.column('line').map(String).join('\n') + '\n';
}

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'frameport-fileops-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadFromFile', () => {
  it('should decode the file and package file metadata', async () => {
    const path = join(dir, 'in.txt');
    await writeFile(path, 'alpha\nbeta\n', 'utf-8');

    const { data, metadata } = await loadFromFile(lineReader, path, 'dataframe', decodeLines);

    expect(data.column('line')).toEqual(['alpha', 'beta']);
    expect(isFileMetadata(metadata) ? metadata.fileMetadata.size : -1).toBe(11);
    expect(metadata.dataframeMetadata).toEqual({ rows: 2, columns: 1, columnNames: ['line'], datatypes: ['object'] });
  });

  it('should fail with TypeMismatchError before reading', async () => {
    const decode = vi.fn(decodeLines);

    await expect(loadFromFile(lineReader, join(dir, 'never-read.txt'), 'records', decode)).rejects.toThrow(
      TypeMismatchError,
    );
    expect(decode).not.toHaveBeenCalled();
  });

  it('should wrap a missing file in CodecError', async () => {
    const failure = loadFromFile(lineReader, join(dir, 'absent.txt'), 'dataframe', decodeLines);

    await expect(failure).rejects.toBeInstanceOf(CodecError);
    await expect(failure).rejects.toMatchObject({ format: 'lines', operation: 'load', adapter: 'LineReader' });
  });
});

describe('saveToFile', () => {
  it('should encode, write once, and describe the written file', async () => {
    const path = join(dir, 'out.txt');
    const frame = DataFrame.fromColumns({ line: ['one', 'two'] });

    const metadata = await saveToFile(lineWriter, path, frame, encodeLines);

    expect(await readFile(path, 'utf-8')).toBe('one\ntwo\n');
    expect(isFileMetadata(metadata) ? metadata.fileMetadata.path : '').toBe(path);
    expect(metadata.dataframeMetadata.columnNames).toEqual(['line']);
  });

  it('should not create the file when the representation is not accepted', async () => {
    const path = join(dir, 'rejected.txt');

    await expect(saveToFile(lineWriter, path, [{ line: 'x' }], encodeLines)).rejects.toThrow(
      "lines writer cannot accept 'records'; applicable types: dataframe",
    );
    await expect(access(path)).rejects.toThrow(/ENOENT/);
  });

  it('should not create the file when encoding fails', async () => {
    const path = join(dir, 'broken.txt');
    const frame = DataFrame.fromColumns({ other: [1] });

    await expect(saveToFile(lineWriter, path, frame, encodeLines)).rejects.toThrow(
      "LineWriter failed to save lines data as 'dataframe': DataFrame: unknown column 'line'",
    );
    await expect(access(path)).rejects.toThrow(/ENOENT/);
  });
});
