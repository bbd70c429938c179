import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import Papa from 'papaparse';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { CodecError, ConfigurationError, DataFrame, isFileMetadata } from '@frameport/core';
import { CsvReader } from '../../src/infrastructure/csv/CsvReader.js';
import { CsvWriter } from '../../src/infrastructure/csv/CsvWriter.js';

const PEOPLE_CSV = fileURLToPath(new URL('../fixtures/people.csv', import.meta.url));

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'frameport-csv-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('CsvReader', () => {
  it('should read a CSV file with typed columns and file metadata', async () => {
    const { data, metadata } = await new CsvReader({ path: PEOPLE_CSV }).load('dataframe');

    expect(data.shape).toEqual([3, 5]);
    expect(data.columns).toEqual(['firstName', 'lastName', 'age', 'department', 'email']);
    expect(data.column('age')).toEqual([36, 45, 41]);
    expect(data.column('department')).toEqual(['Engineering', 'Research', null]);
    expect(metadata.dataframeMetadata.datatypes).toEqual(['object', 'object', 'int64', 'object', 'object']);
    expect(isFileMetadata(metadata) ? metadata.fileMetadata : null).toMatchObject({
      path: PEOPLE_CSV,
      size: 160,
      scheme: 'file',
    });
  });

  it('should materialise records', async () => {
    const { data } = await new CsvReader({ path: PEOPLE_CSV }).load('records');

    expect(data[1]).toEqual({
      firstName: 'Grace',
      lastName: 'Hopper',
      age: 45,
      department: 'Research',
      email: 'grace@example.com',
    });
  });

  it('should number columns when the file has no header', async () => {
    const path = join(dir, 'no-header.csv');
    await writeFile(path, '1,2\n3,4\n', 'utf-8');

    const { data } = await new CsvReader({ path, header: false }).load('dataframe');

    expect(data.toColumns()).toEqual({ '0': [1, 3], '1': [2, 4] });
  });

  it('should keep text when dynamic typing is off', async () => {
    const { data } = await new CsvReader({ path: PEOPLE_CSV, dynamicTyping: false }).load('dataframe');
    expect(data.column('age')).toEqual(['36', '45', '41']);
  });

  it('should expose the PapaParse options it uses', () => {
    const reader = new CsvReader({ path: PEOPLE_CSV, delimiter: ';', preview: 10 });

    expect(reader.loadingOptions()).toEqual({
      encoding: 'utf-8',
      delimiter: ';',
      dynamicTyping: true,
      skipEmptyLines: true,
      quoteChar: '"',
      preview: 10,
      header: false,
    });
  });

  it('should hand PapaParse exactly the options it reports', async () => {
    const parse = vi.spyOn(Papa, 'parse');
    const reader = new CsvReader({ path: PEOPLE_CSV, comments: '#' });

    try {
      await reader.load('records');

      expect(parse).toHaveBeenCalledOnce();
      const { encoding, ...papaOptions } = reader.loadingOptions();
      expect(encoding).toBe('utf-8');
      expect(parse.mock.calls[0]?.[1]).toMatchObject(papaOptions);
      expect(Object.isFrozen(reader.loadingOptions())).toBe(true);
    } finally {
      parse.mockRestore();
    }
  });

  it('should load the same file repeatedly', async () => {
    const first = await new CsvReader({ path: PEOPLE_CSV }).load('records');
    const second = await new CsvReader({ path: PEOPLE_CSV }).load('records');
    expect(second.data).toEqual(first.data);
  });

  it('should fail with CodecError on an unterminated quote', async () => {
    const path = join(dir, 'broken.csv');
    await writeFile(path, 'a,b\n"1,2\n', 'utf-8');

    await expect(new CsvReader({ path }).load('dataframe')).rejects.toBeInstanceOf(CodecError);
  });

  it('should reject rows with extra fields', async () => {
    const path = join(dir, 'wide.csv');
    await writeFile(path, 'a,b\n1,2,3\n', 'utf-8');

    await expect(new CsvReader({ path }).load('dataframe')).rejects.toThrow(
      "CsvReader failed to load csv data as 'dataframe': expected 2 fields, saw 3 (row 1)",
    );
  });

  it('should validate configuration at construction', () => {
    expect(() => new CsvReader({ path: '' })).toThrow(ConfigurationError);
    expect(() => CsvReader.fromConfig({ path: 'a.csv', quoteChar: "''" })).toThrow(ConfigurationError);
  });
});

describe('CsvWriter', () => {
  it('should write and read back the same frame', async () => {
    const path = join(dir, 'roundtrip.csv');
    const frame = DataFrame.fromColumns({ a: [1, 2], b: ['x', null], c: [true, false] });

    const metadata = await new CsvWriter({ path }).save(frame);
    const { data } = await new CsvReader({ path }).load('dataframe');

    expect(await readFile(path, 'utf-8')).toBe('a,b,c\n1,x,true\n2,,false\n');
    expect(data.equals(frame)).toBe(true);
    expect(metadata.dataframeMetadata.columnNames).toEqual(['a', 'b', 'c']);
  });

  it('should quote fields that need it', async () => {
    const path = join(dir, 'quoted.csv');
    const frame = DataFrame.fromColumns({ note: ['a,b', 'say "hi"'] });

    await new CsvWriter({ path }).save(frame);

    expect(await readFile(path, 'utf-8')).toBe('note\n"a,b"\n"say ""hi"""\n');
    expect((await new CsvReader({ path }).load('dataframe')).data.column('note')).toEqual(['a,b', 'say "hi"']);
  });

  it('should write records with a custom delimiter and column subset', async () => {
    const path = join(dir, 'subset.csv');

    await new CsvWriter({ path, delimiter: ';', columns: ['name', 'id'] }).save([
      { id: 1, name: 'Ada', team: 'core' },
      { id: 2, name: 'Grace', team: 'tools' },
    ]);

    expect(await readFile(path, 'utf-8')).toBe('name;id\nAda;1\nGrace;2\n');
  });

  it('should report its saving options', () => {
    expect(new CsvWriter({ path: 'out.csv' }).savingOptions()).toEqual({
      encoding: 'utf-8',
      delimiter: ',',
      header: true,
      quoteChar: '"',
      quotes: false,
      newline: '\n',
    });
  });
});
