const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_VALUES = new Set(['true', 'True', 'TRUE']);
const FALSE_VALUES = new Set(['false', 'False', 'FALSE']);

/**
 * Infer typed values for one text column, the way tabular text readers do:
 * empty cells become `null`, then the column is numeric if every remaining
 * cell parses as a number, boolean if every cell is a boolean literal, and
 * left as text otherwise.
 */
export function inferColumn(values: readonly (string | null)[]): unknown[] {
  const trimmed = values.map((value) => {
    const text = value?.trim() ?? '';
    return text === '' ? null : text;
  });
  const present = trimmed.filter((value): value is string => value !== null);

  if (present.length > 0 && present.every((value) => NUMBER_PATTERN.test(value))) {
    return trimmed.map((value) => (value === null ? null : Number(value)));
  }
  if (present.length > 0 && present.every((value) => TRUE_VALUES.has(value) || FALSE_VALUES.has(value))) {
    return trimmed.map((value) => (value === null ? null : TRUE_VALUES.has(value)));
  }
  return values.map((value, i) => (trimmed[i] === null ? null : value));
}

/** Render one cell as text for the text-based writers. `null` renders as `naRep`. */
export function formatCell(value: unknown, naRep = ''): string {
  if (value === null || value === undefined) return naRep;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  if (typeof value === 'number' && Number.isNaN(value)) return naRep;
  return String(value);
}

/** Bigints mixed only with safe integers. Pass the non-null values. */
export function isBigIntColumn(present: readonly unknown[]): boolean {
  return (
    present.some((value) => typeof value === 'bigint') &&
    present.every((value) => typeof value === 'bigint' || Number.isSafeInteger(value))
  );
}
