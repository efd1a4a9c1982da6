import type { ColumnType } from './ColumnType.js';
import { LoadError } from '../errors/LoadError.js';

/** A single cell. `null` marks a missing value in a column of any type. */
export type CellValue = string | number | Date | null;

/** Name and declared type of a column. */
export interface ColumnSchema {
  readonly name: string;
  readonly type: ColumnType;
}

/** A named, typed column holding one value per row. */
export interface Column extends ColumnSchema {
  readonly values: readonly CellValue[];
}

/**
 * In-memory table: an ordered list of equal-length columns.
 *
 * Row order is insertion order. Adapters that can preserve ordering must hand
 * rows back in the same order they were written.
 */
export interface Dataset {
  readonly name: string;
  readonly columns: readonly Column[];
  readonly rowCount: number;
}

/** A row as a key-value object, keyed by column name. */
export interface DatasetRow {
  readonly [column: string]: CellValue;
}

/**
 * Build a dataset, checking that column names are unique and all columns have
 * the same length.
 *
 * @throws LoadError `INVALID_DATASET` when an invariant is violated.
 */
export function createDataset(name: string, columns: readonly Column[]): Dataset {
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new LoadError('INVALID_DATASET', `Duplicate column '${column.name}' in dataset '${name}'`, {
        dataset: name,
        column: column.name,
      });
    }
    seen.add(column.name);
  }

  const rowCount = columns[0]?.values.length ?? 0;
  for (const column of columns) {
    if (column.values.length !== rowCount) {
      throw new LoadError(
        'INVALID_DATASET',
        `Column '${column.name}' has ${String(column.values.length)} values, expected ${String(rowCount)}`,
        { dataset: name, column: column.name },
      );
    }
  }

  return { name, columns, rowCount };
}

/** Build a dataset from row objects. Keys missing from a row become `null`. */
export function datasetFromRecords(
  name: string,
  schema: readonly ColumnSchema[],
  records: readonly DatasetRow[],
): Dataset {
  const columns = schema.map((col) => ({
    name: col.name,
    type: col.type,
    values: records.map((record) => record[col.name] ?? null),
  }));
  return createDataset(name, columns);
}

/** Ordered column schema of a dataset. */
export function schemaOf(dataset: Dataset): readonly ColumnSchema[] {
  return dataset.columns.map((c) => ({ name: c.name, type: c.type }));
}

export function columnNames(dataset: Dataset): readonly string[] {
  return dataset.columns.map((c) => c.name);
}

export function findColumn(dataset: Dataset, name: string): Column | undefined {
  return dataset.columns.find((c) => c.name === name);
}

/** Row at `index` as a key-value object. Out-of-range indices yield `null` cells. */
export function getRow(dataset: Dataset, index: number): DatasetRow {
  const row: Record<string, CellValue> = {};
  for (const column of dataset.columns) {
    row[column.name] = column.values[index] ?? null;
  }
  return row;
}
