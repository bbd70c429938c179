import type { TableName } from 'sequelize';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/;

/** True when `queryOrTable` names a table (optionally `schema.table`) rather than holding SQL. */
export function isTableReference(queryOrTable: string): boolean {
  return IDENTIFIER.test(queryOrTable.trim());
}

export function toTableName(tableName: string, schema?: string): TableName {
  return schema === undefined ? tableName : { tableName, schema };
}

/** Split `schema.table` into a Sequelize table reference. */
export function parseTableReference(reference: string): TableName {
  const [first, second] = reference.trim().split('.');
  return second === undefined ? (first ?? reference) : { tableName: second, schema: first };
}
