import { DataTypes } from 'sequelize';
import type { DataType, ModelAttributes } from 'sequelize';
import type { DataFrame, DtypeLabel } from '@frameport/core';

export interface IndexColumn {
  readonly index: boolean;
  readonly indexLabel: string;
}

const COLUMN_TYPES: { [K in DtypeLabel]: DataType } = {
  int64: DataTypes.BIGINT,
  float64: DataTypes.DOUBLE,
  bool: DataTypes.BOOLEAN,
  'datetime64[ns]': DataTypes.DATE,
  object: DataTypes.TEXT,
};

export function toColumnType(dtype: DtypeLabel): DataType {
  return COLUMN_TYPES[dtype];
}

/**
 * Table definition for `frame`: one nullable column per frame column, in
 * frame order, preceded by the row-number column when `index` is set.
 */
export function toAttributes(frame: DataFrame, options: IndexColumn): ModelAttributes {
  const attributes: ModelAttributes = {};
  if (options.index) {
    if (frame.hasColumn(options.indexLabel)) {
      throw new Error(`index label '${options.indexLabel}' collides with a column of the same name`);
    }
    attributes[options.indexLabel] = { type: DataTypes.BIGINT, allowNull: false };
  }
  for (const name of frame.columns) {
    attributes[name] = { type: toColumnType(frame.dtype(name)), allowNull: true };
  }
  return attributes;
}
