import type { LoadErrorInfo } from '../errors/LoadError.js';

/** Size of one representation and its compression ratio against the baseline. */
export interface RepresentationEfficiency {
  readonly sizeBytes: number;
  /** `baselineSize / sizeBytes`; `null` when the ratios could not be computed. */
  readonly ratio: number | null;
}

/** Efficiency figures for all representations of one dataset. */
export interface DatasetEfficiency {
  readonly dataset: string;
  readonly representations: Readonly<Record<string, RepresentationEfficiency>>;
  /** Set when the ratios could not be computed (e.g. `DIVISION_ERROR`). */
  readonly error: LoadErrorInfo | null;
}

/** Storage efficiency of a load run, measured once all writes completed. */
export interface EfficiencyRecord {
  readonly baseline: string;
  readonly datasets: readonly DatasetEfficiency[];
}
