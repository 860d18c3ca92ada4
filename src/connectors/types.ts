export type RowValue =
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  /** `text` is the exact source form when there is one; it is what gets hashed. */
  | { kind: 'temporal'; value: Date; text?: string }
  /** A source value with no native variant, kept as its canonical string form. */
  | { kind: 'opaque'; value: string };

export type Row = Record<string, RowValue>;

export interface Extractor {
  name: string;
  /** Read every row of a table. Must be safe to call again after a failure. */
  fetch(table: string): Promise<Row[]>;
  close?(): void;
}

export const NULL_VALUE: RowValue = { kind: 'null' };

export function str(value: string): RowValue {
  return { kind: 'string', value };
}

export function num(value: number): RowValue {
  return { kind: 'number', value };
}

export function bool(value: boolean): RowValue {
  return { kind: 'boolean', value };
}

export function temporal(value: Date, text?: string): RowValue {
  return text === undefined ? { kind: 'temporal', value } : { kind: 'temporal', value, text };
}

/**
 * Map a raw driver value onto the tagged variant.
 * Anything without a native variant degrades to `opaque` instead of failing.
 */
export function toRowValue(raw: unknown): RowValue {
  if (raw === null || raw === undefined) return NULL_VALUE;

  switch (typeof raw) {
    case 'string':
      return str(raw);
    case 'number':
      return num(raw);
    case 'boolean':
      return bool(raw);
    case 'bigint':
      return Number.isSafeInteger(Number(raw)) ? num(Number(raw)) : { kind: 'opaque', value: raw.toString() };
    default:
      break;
  }

  if (raw instanceof Date) return temporal(raw);
  if (Buffer.isBuffer(raw)) return { kind: 'opaque', value: raw.toString('hex') };

  try {
    return { kind: 'opaque', value: JSON.stringify(raw) ?? String(raw) };
  } catch {
    return { kind: 'opaque', value: String(raw) };
  }
}

/** Build a Row from a plain object, keeping column order. */
export function toRow(record: Record<string, unknown>): Row {
  const row: Row = {};
  for (const [column, value] of Object.entries(record)) {
    row[column] = toRowValue(value);
  }
  return row;
}
