import type { SchemaElement } from 'hyparquet';
import type { CellValue, ColumnSchema, ColumnType } from '@loadcheck/core';

type LeafType = Pick<SchemaElement, 'type' | 'converted_type'>;

const LEAF_TYPES: Record<ColumnType, LeafType> = {
  text: { type: 'BYTE_ARRAY', converted_type: 'UTF8' },
  int32: { type: 'INT32' },
  int64: { type: 'INT64' },
  float32: { type: 'FLOAT' },
  float64: { type: 'DOUBLE' },
  datetime: { type: 'INT64', converted_type: 'TIMESTAMP_MILLIS' },
};

/**
 * File schema for the dataset columns: the root element followed by one
 * optional leaf per column, in column order.
 */
export function parquetSchema(columns: readonly ColumnSchema[]): SchemaElement[] {
  return [
    { name: 'root', num_children: columns.length },
    ...columns.map((c): SchemaElement => ({ name: c.name, repetition_type: 'OPTIONAL', ...LEAF_TYPES[c.type] })),
  ];
}

const TIMESTAMP_CONVERTED_TYPES: ReadonlySet<string> = new Set(['TIMESTAMP_MILLIS', 'TIMESTAMP_MICROS']);

/**
 * Dataset column type of a leaf schema element, as stored in the file footer.
 * Physical types without a dataset counterpart read back as text.
 */
export function columnTypeOf(element: SchemaElement): ColumnType {
  switch (element.type) {
    case 'INT32':
      return 'int32';
    case 'INT64':
      if (
        (element.converted_type !== undefined && TIMESTAMP_CONVERTED_TYPES.has(element.converted_type)) ||
        element.logical_type?.type === 'TIMESTAMP'
      ) {
        return 'datetime';
      }
      return 'int64';
    case 'INT96':
      return 'datetime';
    case 'FLOAT':
      return 'float32';
    case 'DOUBLE':
      return 'float64';
    default:
      return 'text';
  }
}

function toNumber(value: CellValue): number | null {
  if (value === null) return null;
  if (typeof value === 'number') return value;
  if (value instanceof Date) return value.getTime();
  if (value.trim() === '') return null;
  return Number(value);
}

function toBigInt(value: CellValue): bigint | null {
  const n = toNumber(value);
  if (n === null || !Number.isFinite(n)) return null;
  return BigInt(Math.trunc(n));
}

function toDate(value: CellValue): Date | null {
  if (value === null || value === '') return null;
  return value instanceof Date ? value : new Date(value);
}

function toText(value: CellValue): string | null {
  if (value === null) return null;
  return value instanceof Date ? value.toISOString() : String(value);
}

/** Column values in the shape hyparquet-writer expects for `type`. */
export function toParquetValues(
  values: readonly CellValue[],
  type: ColumnType,
): (string | number | bigint | Date | null)[] {
  switch (type) {
    case 'text':
      return values.map(toText);
    case 'int64':
      return values.map(toBigInt);
    case 'datetime':
      return values.map(toDate);
    case 'int32':
    case 'float32':
    case 'float64':
      return values.map(toNumber);
  }
}

/** Cell value of a decoded parquet value. INT64 arrives as `bigint`. */
export function fromParquetValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (value instanceof Date) return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf-8');
  return String(value);
}
