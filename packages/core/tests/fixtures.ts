import type { CellValue, Column, Dataset } from '../src/domain/model/Dataset.js';
import { createDataset } from '../src/domain/model/Dataset.js';
import type { ColumnType } from '../src/domain/model/ColumnType.js';

export function column(name: string, type: ColumnType, values: CellValue[]): Column {
  return { name, type, values };
}

/** Three-column dataset with an integer id, a text name and a float score. */
export function peopleDataset(name = 'full'): Dataset {
  return createDataset(name, [
    column('id', 'int64', [1, 2, 3]),
    column('name', 'text', ['Ada', 'Grace', 'Linus']),
    column('score', 'float64', [9.5, 7.25, 8]),
  ]);
}

/**
 * Deterministic `rows`-row dataset: id, label, amount, ratio, recorded_at.
 * Values repeat in a small range so columnar encodings compress well.
 */
export function syntheticDataset(name: string, rows: number): Dataset {
  const ids: CellValue[] = [];
  const labels: CellValue[] = [];
  const amounts: CellValue[] = [];
  const ratios: CellValue[] = [];
  const recordedAt: CellValue[] = [];
  const labelPool = ['alpha', 'beta', 'gamma', 'delta'];
  const base = Date.UTC(2024, 0, 1);

  for (let i = 0; i < rows; i++) {
    ids.push(i + 1);
    labels.push(labelPool[i % labelPool.length] ?? 'alpha');
    amounts.push((i % 50) * 10);
    ratios.push((i % 8) / 4 + 0.125);
    recordedAt.push(new Date(base + (i % 24) * 3_600_000));
  }

  return createDataset(name, [
    column('id', 'int64', ids),
    column('label', 'text', labels),
    column('amount', 'int32', amounts),
    column('ratio', 'float64', ratios),
    column('recorded_at', 'datetime', recordedAt),
  ]);
}

/** Copy of `dataset` keeping only the first `rows` rows. */
export function truncate(dataset: Dataset, rows: number): Dataset {
  return createDataset(
    dataset.name,
    dataset.columns.map((c) => ({ ...c, values: c.values.slice(0, rows) })),
  );
}
