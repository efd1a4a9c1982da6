import { join } from 'node:path';
import type { Dataset } from '../model/Dataset.js';
import type { LoadInput } from '../model/LoadInput.js';

/** Builds destinations for one format from a dataset name. */
export type DestinationResolver = (datasetName: string) => string;

export interface LoadPlanOptions {
  /** Full dataset produced by the transform stage. */
  readonly full: Dataset;
  /** Incremental subset. Omit when only a full load is performed. */
  readonly incremental?: Dataset;
  /** Directory receiving file-based copies. */
  readonly outputDir: string;
  /** Format names written as files, mapped to their file extension. Default: `{ csv: 'csv', parquet: 'parquet' }`. */
  readonly fileFormats?: Readonly<Record<string, string>>;
  /** Format names written as tables. Default: `['sequelize']`. */
  readonly tableFormats?: readonly string[];
  /** Prefix of table names. Default: `''`. */
  readonly tablePrefix?: string;
}

/**
 * Conventional load plan for the `full` + `incremental` pair: one file per
 * dataset and file format under `outputDir`, one table per dataset and table
 * format named `<tablePrefix><dataset>`.
 */
export function buildLoadPlan(options: LoadPlanOptions): LoadInput[] {
  const fileFormats = options.fileFormats ?? { csv: 'csv', parquet: 'parquet' };
  const tableFormats = options.tableFormats ?? ['sequelize'];
  const tablePrefix = options.tablePrefix ?? '';

  const resolvers: Array<[string, DestinationResolver]> = [
    ...Object.entries(fileFormats).map(([format, ext]): [string, DestinationResolver] => [
      format,
      (name) => join(options.outputDir, `${name}.${ext}`),
    ]),
    ...tableFormats.map((format): [string, DestinationResolver] => [format, (name) => `${tablePrefix}${name}`]),
  ];

  const datasets = options.incremental ? [options.full, options.incremental] : [options.full];

  return datasets.map((dataset) => {
    const destinations: Record<string, string> = {};
    for (const [format, resolve] of resolvers) {
      destinations[format] = resolve(dataset.name);
    }
    return { dataset, destinations };
  });
}
