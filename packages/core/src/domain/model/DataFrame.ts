/** A row keyed by column name, as produced by the `records` representation. */
export interface DataRecord {
  readonly [column: string]: unknown;
}

/** NumPy-style dtype labels reported in metadata. */
export type DtypeLabel = 'int64' | 'float64' | 'bool' | 'datetime64[ns]' | 'object';

/**
 * Immutable column-oriented table.
 *
 * Column order is significant and preserved through every conversion; it is the
 * order reported in `dataframeMetadata.columnNames`. Missing values are `null`.
 */
export class DataFrame {
  readonly columns: readonly string[];
  readonly rowCount: number;
  private readonly data: ReadonlyMap<string, readonly unknown[]>;

  private constructor(columns: readonly string[], data: ReadonlyMap<string, readonly unknown[]>, rowCount: number) {
    this.columns = columns;
    this.data = data;
    this.rowCount = rowCount;
  }

  /**
   * Build a frame from one array per column.
   *
   * `order` fixes the column order; it defaults to the key order of `columns`.
   * Throws when columns have different lengths or `order` names an unknown column.
   */
  static fromColumns(columns: Readonly<Record<string, readonly unknown[]>>, order?: readonly string[]): DataFrame {
    const names = order ?? Object.keys(columns);
    assertUniqueNames(names);

    const data = new Map<string, readonly unknown[]>();
    let rowCount: number | null = null;

    for (const name of names) {
      const values = Object.prototype.hasOwnProperty.call(columns, name) ? columns[name] : undefined;
      if (values === undefined) {
        throw new Error(`DataFrame: column '${name}' is missing from the input`);
      }
      if (rowCount !== null && values.length !== rowCount) {
        throw new Error(
          `DataFrame: column '${name}' has ${String(values.length)} values, expected ${String(rowCount)}`,
        );
      }
      rowCount = values.length;
      data.set(name, values.map(normalizeCell));
    }

    return new DataFrame([...names], data, rowCount ?? 0);
  }

  /**
   * Build a frame from row objects. Columns appear in first-seen key order
   * unless `order` is given; keys absent from a row become `null`.
   */
  static fromRecords(records: readonly DataRecord[], order?: readonly string[]): DataFrame {
    const names: string[] = order ? [...order] : [];
    if (!order) {
      const seen = new Set<string>();
      for (const record of records) {
        for (const key of Object.keys(record)) {
          if (!seen.has(key)) {
            seen.add(key);
            names.push(key);
          }
        }
      }
    }
    assertUniqueNames(names);

    const data = new Map<string, readonly unknown[]>();
    for (const name of names) {
      data.set(
        name,
        records.map((record) => normalizeCell(record[name])),
      );
    }

    return new DataFrame(names, data, records.length);
  }

  /** A frame with no columns and no rows. */
  static empty(): DataFrame {
    return new DataFrame([], new Map(), 0);
  }

  get columnCount(): number {
    return this.columns.length;
  }

  /** `[rows, columns]`. */
  get shape(): readonly [number, number] {
    return [this.rowCount, this.columns.length];
  }

  hasColumn(name: string): boolean {
    return this.data.has(name);
  }

  column(name: string): readonly unknown[] {
    const values = this.data.get(name);
    if (!values) {
      throw new Error(`DataFrame: unknown column '${name}'`);
    }
    return values;
  }

  row(index: number): DataRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.rowCount) {
      throw new RangeError(`DataFrame: row ${String(index)} is out of range (0..${String(this.rowCount - 1)})`);
    }
    const row: Record<string, unknown> = {};
    for (const name of this.columns) {
      row[name] = this.column(name)[index];
    }
    return row;
  }

  toRecords(): DataRecord[] {
    const rows: DataRecord[] = [];
    for (let i = 0; i < this.rowCount; i++) {
      rows.push(this.row(i));
    }
    return rows;
  }

  toColumns(): Record<string, unknown[]> {
    const result: Record<string, unknown[]> = {};
    for (const name of this.columns) {
      result[name] = [...this.column(name)];
    }
    return result;
  }

  /** Project onto a subset of columns, in the given order. */
  select(names: readonly string[]): DataFrame {
    const data = new Map<string, readonly unknown[]>();
    for (const name of names) {
      data.set(name, this.column(name));
    }
    assertUniqueNames(names);
    return new DataFrame([...names], data, this.rowCount);
  }

  /** Apply `fn` to every value of one column, returning a new frame. */
  mapColumn(name: string, fn: (value: unknown) => unknown): DataFrame {
    const data = new Map(this.data);
    data.set(name, this.column(name).map((value) => normalizeCell(fn(value))));
    return new DataFrame(this.columns, data, this.rowCount);
  }

  dtype(name: string): DtypeLabel {
    return inferDtype(this.column(name));
  }

  /** Per-column dtype labels, aligned with `columns`. */
  dtypes(): DtypeLabel[] {
    return this.columns.map((name) => this.dtype(name));
  }

  /** Exact equality: same column order, same row count, same values (Dates by time). */
  equals(other: DataFrame): boolean {
    if (this.rowCount !== other.rowCount || this.columns.length !== other.columns.length) return false;
    for (let c = 0; c < this.columns.length; c++) {
      const name = this.columns[c];
      if (name === undefined || name !== other.columns[c]) return false;
      const left = this.column(name);
      const right = other.column(name);
      for (let r = 0; r < this.rowCount; r++) {
        if (!cellEquals(left[r], right[r])) return false;
      }
    }
    return true;
  }
}

function assertUniqueNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new Error(`DataFrame: duplicate column name '${name}'`);
    }
    seen.add(name);
  }
}

function normalizeCell(value: unknown): unknown {
  return value === undefined ? null : value;
}

function cellEquals(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) return true;
  if (isPlainContainer(a) && isPlainContainer(b)) return JSON.stringify(a) === JSON.stringify(b);
  return a === b;
}

function isPlainContainer(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !(value instanceof Date);
}

/**
 * Infer a dtype label from column values.
 *
 * Integers with missing values widen to `float64`; an all-null column is `object`.
 */
export function inferDtype(values: readonly unknown[]): DtypeLabel {
  let hasNull = false;
  let kind: 'int' | 'float' | 'bool' | 'date' | 'object' | null = null;

  for (const value of values) {
    if (value === null) {
      hasNull = true;
      continue;
    }
    const current = cellKind(value);
    if (kind === null) {
      kind = current;
    } else if (kind !== current) {
      if ((kind === 'int' && current === 'float') || (kind === 'float' && current === 'int')) {
        kind = 'float';
      } else {
        return 'object';
      }
    }
  }

  switch (kind) {
    case 'int':
      return hasNull ? 'float64' : 'int64';
    case 'float':
      return 'float64';
    case 'bool':
      return hasNull ? 'object' : 'bool';
    case 'date':
      return 'datetime64[ns]';
    default:
      return 'object';
  }
}

function cellKind(value: unknown): 'int' | 'float' | 'bool' | 'date' | 'object' {
  if (typeof value === 'bigint') return 'int';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'boolean') return 'bool';
  if (value instanceof Date) return 'date';
  return 'object';
}
