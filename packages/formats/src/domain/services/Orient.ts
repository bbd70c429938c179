import { DataFrame } from '@frameport/core';
import type { DataRecord } from '@frameport/core';

/**
 * Document layouts shared by the JSON and YAML adapters.
 *
 * - `records`: `[{ col: value, ... }, ...]`
 * - `columns`: `{ col: { "0": value, "1": value }, ... }` (plain arrays are accepted on read)
 * - `split`: `{ columns: [...], index: [...], data: [[...], ...] }`
 */
export const ORIENTS = ['records', 'columns', 'split'] as const;

export type Orient = (typeof ORIENTS)[number];

/** Lay `frame` out as a plain document in the given orient. */
export function frameToDocument(frame: DataFrame, orient: Orient): unknown {
  switch (orient) {
    case 'records':
      return frame.toRecords();
    case 'columns': {
      const document: Record<string, Record<string, unknown>> = {};
      for (const name of frame.columns) {
        const byIndex: Record<string, unknown> = {};
        frame.column(name).forEach((value, index) => {
          byIndex[String(index)] = value;
        });
        document[name] = byIndex;
      }
      return document;
    }
    case 'split':
      return {
        columns: [...frame.columns],
        index: Array.from({ length: frame.rowCount }, (_, i) => i),
        data: frame.toRecords().map((row) => frame.columns.map((name) => row[name])),
      };
  }
}

/** Guess the orient of a parsed document. */
export function detectOrient(document: unknown): Orient {
  if (Array.isArray(document)) return 'records';
  if (isObject(document) && Array.isArray(document.columns) && Array.isArray(document.data)) return 'split';
  return 'columns';
}

/**
 * Rebuild a frame from a parsed document. The orient is detected when not given.
 *
 * Throws when the document does not have the expected layout.
 */
export function documentToFrame(document: unknown, orient?: Orient): DataFrame {
  if (document === null || document === undefined) return DataFrame.empty();

  switch (orient ?? detectOrient(document)) {
    case 'records':
      return fromRecordsDocument(document);
    case 'columns':
      return fromColumnsDocument(document);
    case 'split':
      return fromSplitDocument(document);
  }
}

function fromRecordsDocument(document: unknown): DataFrame {
  if (!Array.isArray(document)) {
    throw new Error("expected an array of objects for orient 'records'");
  }
  const records: DataRecord[] = [];
  for (const item of document) {
    if (!isObject(item)) {
      throw new Error("each item must be an object for orient 'records'");
    }
    records.push(item);
  }
  return DataFrame.fromRecords(records);
}

function fromColumnsDocument(document: unknown): DataFrame {
  if (!isObject(document)) {
    throw new Error("expected an object of columns for orient 'columns'");
  }
  const columns: Record<string, unknown[]> = {};
  for (const [name, values] of Object.entries(document)) {
    if (Array.isArray(values)) {
      columns[name] = values;
    } else if (isObject(values)) {
      columns[name] = Object.keys(values)
        .sort(compareIndexKeys)
        .map((key) => values[key]);
    } else {
      throw new Error(`column '${name}' must be an array or an index-keyed object`);
    }
  }
  return DataFrame.fromColumns(columns);
}

function fromSplitDocument(document: unknown): DataFrame {
  if (!isObject(document) || !Array.isArray(document.columns) || !Array.isArray(document.data)) {
    throw new Error("expected { columns, data } for orient 'split'");
  }
  const names = document.columns.map(String);
  const columns: Record<string, unknown[]> = {};
  for (const name of names) {
    columns[name] = [];
  }
  for (const row of document.data) {
    if (!Array.isArray(row) || row.length !== names.length) {
      throw new Error(`each row must be an array of ${String(names.length)} values for orient 'split'`);
    }
    names.forEach((name, i) => {
      columns[name]?.push(row[i]);
    });
  }
  return DataFrame.fromColumns(columns, names);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Numeric keys in numeric order, ahead of any others, which sort as text. */
function compareIndexKeys(a: string, b: string): number {
  const left = Number(a);
  const right = Number(b);
  const leftNumeric = a.trim() !== '' && !Number.isNaN(left);
  const rightNumeric = b.trim() !== '' && !Number.isNaN(right);
  if (leftNumeric && rightNumeric) return left - right;
  if (leftNumeric !== rightNumeric) return leftNumeric ? -1 : 1;
  return a.localeCompare(b);
}
