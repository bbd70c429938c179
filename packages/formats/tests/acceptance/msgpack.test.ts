import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Packr } from 'msgpackr';
import { CodecError, DataFrame } from '@frameport/core';
import { MsgpackReader } from '../../src/infrastructure/msgpack/MsgpackReader.js';
import { MsgpackWriter } from '../../src/infrastructure/msgpack/MsgpackWriter.js';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'frameport-msgpack-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('MessagePack adapters', () => {
  const frame = DataFrame.fromColumns({
    name: ['Ada', 'Grace', null],
    score: [9.5, 8, 7.25],
    active: [true, false, true],
    joined: [new Date(Date.UTC(2020, 0, 1)), new Date(Date.UTC(2021, 5, 30)), null],
  });

  it('should round-trip a frame exactly', async () => {
    const path = join(dir, 'frame.msgpack');

    await new MsgpackWriter({ path }).save(frame);
    const { data } = await new MsgpackReader({ path }).load('dataframe');

    expect(data.equals(frame)).toBe(true);
  });

  it('should decode with maps kept as Map', async () => {
    const path = join(dir, 'maps.msgpack');

    await new MsgpackWriter({ path }).save(frame);
    const { data } = await new MsgpackReader({ path, mapsAsObjects: false }).load('records');

    expect(data[1]).toEqual({ name: 'Grace', score: 8, active: false, joined: new Date(Date.UTC(2021, 5, 30)) });
  });

  it('should read a plain array of maps', async () => {
    const path = join(dir, 'rows.mp');
    await writeFile(path, new Packr({ useRecords: false }).pack([{ a: 1 }, { b: 'x' }]));

    const { data } = await new MsgpackReader({ path }).load('records');

    expect(data).toEqual([
      { a: 1, b: null },
      { a: null, b: 'x' },
    ]);
  });

  it('should reject documents of another shape', async () => {
    const path = join(dir, 'scalar.msgpack');
    await writeFile(path, new Packr({ useRecords: false }).pack(42));

    await expect(new MsgpackReader({ path }).load('dataframe')).rejects.toThrow(CodecError);
  });

  it('should expose its options', () => {
    expect(new MsgpackWriter({ path: 'a.msgpack' }).savingOptions()).toEqual({ useRecords: false });
    expect(new MsgpackReader({ path: 'a.msgpack' }).loadingOptions()).toEqual({ mapsAsObjects: true });
  });
});
