import { ColumnType } from '../model/ColumnType.js';
import type { CellValue } from '../model/Dataset.js';

const INTEGER_PATTERN = /^-?\d+$/;
const FLOAT_PATTERN = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function isEmpty(value: string | null): value is null | '' {
  return value === null || value === '';
}

/**
 * Infer a column type from textual values, for formats that store no schema.
 *
 * Empty strings and `null` are ignored. A column with no values at all is
 * treated as text. Integers are always inferred as `int64` because text carries
 * no width.
 */
export function inferColumnType(values: readonly (string | null)[]): ColumnType {
  const present = values.filter((v): v is string => !isEmpty(v));
  if (present.length === 0) return ColumnType.TEXT;

  if (present.every((v) => INTEGER_PATTERN.test(v) && Number.isSafeInteger(Number(v)))) {
    return ColumnType.INT64;
  }
  if (present.every((v) => FLOAT_PATTERN.test(v))) {
    return ColumnType.FLOAT64;
  }
  if (present.every((v) => DATETIME_PATTERN.test(v) && !Number.isNaN(Date.parse(v)))) {
    return ColumnType.DATETIME;
  }
  return ColumnType.TEXT;
}

/** Convert a textual cell into a typed value. Empty text becomes `null`. */
export function parseCell(value: string | null, type: ColumnType): CellValue {
  if (isEmpty(value)) return null;

  switch (type) {
    case ColumnType.INT32:
    case ColumnType.INT64:
    case ColumnType.FLOAT32:
    case ColumnType.FLOAT64:
      return Number(value);
    case ColumnType.DATETIME:
      return new Date(value);
    case ColumnType.TEXT:
      return value;
  }
}

/** Render a typed value as text. Datetimes use ISO-8601, `null` becomes the empty string. */
export function formatCell(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
