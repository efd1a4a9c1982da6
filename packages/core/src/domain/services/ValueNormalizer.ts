import { ColumnType } from '../model/ColumnType.js';
import type { CellValue } from '../model/Dataset.js';

/** Comparable form of a cell: numbers for numeric and temporal columns, strings for text. */
export type NormalizedValue = number | string | null;

function toNumber(value: CellValue): number | null {
  if (value === null) return null;
  if (typeof value === 'number') return value;
  if (value instanceof Date) return value.getTime();
  if (value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function toEpochMillis(value: CellValue): number | null {
  if (value === null) return null;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number') return value;
  if (value.trim() === '') return null;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

function toText(value: CellValue): string | null {
  if (value === null || value === '') return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Normalise a cell by the *source* column type so that values read back from
 * any format can be compared with the originals.
 *
 * - numeric: parsed to a number; `float32` is rounded to single precision
 * - datetime: epoch milliseconds
 * - text: string, with empty text equal to `null`
 */
export function normalizeValue(value: CellValue, type: ColumnType): NormalizedValue {
  switch (type) {
    case ColumnType.INT32:
    case ColumnType.INT64:
    case ColumnType.FLOAT64:
      return toNumber(value);
    case ColumnType.FLOAT32: {
      const n = toNumber(value);
      return n === null ? null : Math.fround(n);
    }
    case ColumnType.DATETIME:
      return toEpochMillis(value);
    case ColumnType.TEXT:
      return toText(value);
  }
}

/**
 * Compare two normalised values. Numbers match when their relative difference
 * is within `tolerance` (`0` means exact); `NaN` matches `NaN`.
 */
export function valuesEqual(a: NormalizedValue, b: NormalizedValue, tolerance = 0): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Object.is(a, b) || a === b) return true;
    if (Number.isNaN(a) || Number.isNaN(b)) return false;
    return Math.abs(a - b) <= tolerance * Math.max(Math.abs(a), Math.abs(b));
  }
  return a === b;
}
