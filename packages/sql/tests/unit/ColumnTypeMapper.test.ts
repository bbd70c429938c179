import { describe, it, expect } from 'vitest';
import { DataTypes } from 'sequelize';
import { DataFrame } from '@frameport/core';
import { toAttributes, toColumnType } from '../../src/mappers/ColumnTypeMapper.js';

describe('ColumnTypeMapper', () => {
  it.each([
    ['int64', DataTypes.BIGINT],
    ['float64', DataTypes.DOUBLE],
    ['bool', DataTypes.BOOLEAN],
    ['datetime64[ns]', DataTypes.DATE],
    ['object', DataTypes.TEXT],
  ] as const)('should map %s', (dtype, expected) => {
    expect(toColumnType(dtype)).toBe(expected);
  });

  it('should define nullable columns in frame order', () => {
    const frame = DataFrame.fromColumns({ name: ['Ada'], score: [9.5], active: [true] });

    const attributes = toAttributes(frame, { index: false, indexLabel: 'index' });

    expect(Object.keys(attributes)).toEqual(['name', 'score', 'active']);
    expect(attributes['score']).toEqual({ type: DataTypes.DOUBLE, allowNull: true });
  });

  it('should put the index column first', () => {
    const frame = DataFrame.fromColumns({ name: ['Ada'] });

    const attributes = toAttributes(frame, { index: true, indexLabel: 'row_id' });

    expect(Object.keys(attributes)).toEqual(['row_id', 'name']);
    expect(attributes['row_id']).toEqual({ type: DataTypes.BIGINT, allowNull: false });
  });

  it('should reject an index label that is also a column', () => {
    const frame = DataFrame.fromColumns({ index: [1] });
    expect(() => toAttributes(frame, { index: true, indexLabel: 'index' })).toThrow(
      "index label 'index' collides with a column of the same name",
    );
  });
});
