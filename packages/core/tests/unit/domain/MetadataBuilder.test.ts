import { describe, it, expect } from 'vitest';
import { DataFrame } from '../../../src/domain/model/DataFrame.js';
import { isFileMetadata, isSqlMetadata } from '../../../src/domain/model/ResultMetadata.js';
import { buildResultMetadata, describeDataFrame } from '../../../src/domain/services/MetadataBuilder.js';

describe('MetadataBuilder', () => {
  const frame = DataFrame.fromColumns({ id: [1, 2, 3], label: ['a', 'b', null] });

  it('should describe a frame as it is', () => {
    expect(describeDataFrame(frame)).toEqual({
      rowCount: 3,
      columnNames: ['id', 'label'],
      columnDtypes: ['int64', 'object'],
    });
  });

  it('should build a file envelope', () => {
    const metadata = buildResultMetadata(
      { kind: 'file', path: '/tmp/out.csv', size: 42, lastModified: 1000, timestamp: 2000 },
      describeDataFrame(frame),
    );

    expect(metadata).toEqual({
      fileMetadata: { path: '/tmp/out.csv', size: 42, lastModified: 1000, timestamp: 2000, scheme: 'file' },
      dataframeMetadata: { rows: 3, columns: 2, columnNames: ['id', 'label'], datatypes: ['int64', 'object'] },
    });
    expect(isFileMetadata(metadata)).toBe(true);
    expect(isSqlMetadata(metadata)).toBe(false);
  });

  it('should build a sql envelope without absent optional fields', () => {
    const metadata = buildResultMetadata({ kind: 'sql', rows: 2, timestamp: 5 }, describeDataFrame(frame));

    expect(metadata).toEqual({
      sqlMetadata: { rows: 2, timestamp: 5 },
      dataframeMetadata: { rows: 3, columns: 2, columnNames: ['id', 'label'], datatypes: ['int64', 'object'] },
    });
    expect(isSqlMetadata(metadata) && 'query' in metadata.sqlMetadata).toBe(false);
  });

  it('should keep query and table name when given', () => {
    const metadata = buildResultMetadata(
      { kind: 'sql', rows: 2, query: 'SELECT 1', tableName: 'people', timestamp: 5 },
      describeDataFrame(frame),
    );
    expect(isSqlMetadata(metadata) ? metadata.sqlMetadata.query : undefined).toBe('SELECT 1');
    expect(isSqlMetadata(metadata) ? metadata.sqlMetadata.tableName : undefined).toBe('people');
  });

  it('should reject misaligned names and dtypes', () => {
    expect(() =>
      buildResultMetadata(
        { kind: 'sql', rows: 0, timestamp: 0 },
        { rowCount: 0, columnNames: ['a', 'b'], columnDtypes: ['int64'] },
      ),
    ).toThrow('MetadataBuilder: 2 column names but 1 dtypes');
  });
});
