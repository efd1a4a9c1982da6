import type { Dataset } from './Dataset.js';

/**
 * One dataset to load and where each format should put it.
 *
 * `destinations` is keyed by format name (e.g. `{ parquet: 'out/full.parquet',
 * sequelize: 'full_records' }`). Every key must name a registered adapter.
 */
export interface LoadInput {
  readonly dataset: Dataset;
  readonly destinations: Readonly<Record<string, string>>;
}
