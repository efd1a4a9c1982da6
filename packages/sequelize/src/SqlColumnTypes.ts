import { DataTypes } from 'sequelize';
import type { DataType } from 'sequelize';
import { ColumnType, formatCell } from '@loadcheck/core';
import type { CellValue } from '@loadcheck/core';

const INT32_TYPES: ReadonlySet<string> = new Set(['INTEGER', 'INT', 'MEDIUMINT', 'SMALLINT', 'TINYINT']);

/**
 * Sequelize attribute type for a dataset column type.
 *
 * PostgreSQL reads a bare `FLOAT` as double precision, so single-precision
 * columns use `REAL` there.
 */
export function attributeTypeOf(type: ColumnType, dialect: string): DataType {
  switch (type) {
    case ColumnType.TEXT:
      return DataTypes.TEXT;
    case ColumnType.INT32:
      return DataTypes.INTEGER;
    case ColumnType.INT64:
      return DataTypes.BIGINT;
    case ColumnType.FLOAT32:
      return dialect === 'postgres' ? DataTypes.REAL : DataTypes.FLOAT;
    case ColumnType.FLOAT64:
      return DataTypes.DOUBLE;
    case ColumnType.DATETIME:
      return DataTypes.DATE(3);
  }
}

/**
 * Column type for a type name reported by `describeTable`. SQLite keeps every
 * floating-point value in 8 bytes, whatever the declared type.
 */
export function columnTypeOf(sqlType: string, dialect: string): ColumnType {
  const base = sqlType.toUpperCase().replace(/\(.*\)/, '').trim();

  if (base === 'BIGINT') return ColumnType.INT64;
  if (INT32_TYPES.has(base)) return ColumnType.INT32;
  if (base.startsWith('DOUBLE') || base === 'DECIMAL' || base === 'NUMERIC') return ColumnType.FLOAT64;
  if (base === 'FLOAT' || base === 'REAL') {
    return dialect === 'sqlite' ? ColumnType.FLOAT64 : ColumnType.FLOAT32;
  }
  if (base.startsWith('TIMESTAMP') || base.startsWith('DATETIME') || base === 'DATE') return ColumnType.DATETIME;
  return ColumnType.TEXT;
}

/** Value handed to Sequelize for a cell of the given column type. */
export function toSqlValue(value: CellValue, type: ColumnType): CellValue {
  if (value === null) return null;

  switch (type) {
    case ColumnType.TEXT:
      return formatCell(value);
    case ColumnType.DATETIME:
      return value instanceof Date ? value : new Date(value);
    case ColumnType.INT32:
    case ColumnType.INT64:
    case ColumnType.FLOAT32:
    case ColumnType.FLOAT64:
      return value instanceof Date ? value.getTime() : Number(value);
  }
}

/** Cell value from what the driver returned. BIGINT arrives as a string on some dialects. */
export function fromSqlValue(value: unknown, type: ColumnType): CellValue {
  if (value === null || value === undefined) return null;

  switch (type) {
    case ColumnType.TEXT:
      return typeof value === 'string' ? value : String(value);
    case ColumnType.DATETIME:
      if (value instanceof Date) return value;
      return typeof value === 'string' || typeof value === 'number' ? new Date(value) : null;
    case ColumnType.INT32:
    case ColumnType.INT64:
    case ColumnType.FLOAT32:
    case ColumnType.FLOAT64:
      if (typeof value === 'number') return value;
      return typeof value === 'string' || typeof value === 'bigint' ? Number(value) : null;
  }
}
