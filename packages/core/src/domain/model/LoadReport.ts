import type { LoadErrorInfo } from '../errors/LoadError.js';
import type { EfficiencyRecord } from './EfficiencyRecord.js';
import type { LoadStatus } from './LoadStatus.js';
import { isLoadStatus } from './LoadStatus.js';
import type { CopyVerification } from './VerificationResult.js';

/** Outcome of writing one (dataset, format) copy. */
export interface WriteOutcome {
  readonly dataset: string;
  readonly format: string;
  readonly destination: string;
  /** Bytes the copy occupies; `null` when the write failed. */
  readonly bytesWritten: number | null;
  readonly error: LoadErrorInfo | null;
}

/**
 * Complete, serialisable record of a load run. Returned for every run,
 * including failed ones, and never mutated after the run completes.
 */
export interface LoadReport {
  readonly runId: string;
  readonly status: LoadStatus;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly elapsedMs: number;
  readonly writes: readonly WriteOutcome[];
  readonly verifications: readonly CopyVerification[];
  /** `null` when the run failed before all writes completed. */
  readonly efficiency: EfficiencyRecord | null;
  /** Fatal error that stopped the run (write failure), if any. */
  readonly error: LoadErrorInfo | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Shallow structural check for a report read back from storage. */
export function isLoadReport(value: unknown): value is LoadReport {
  return (
    isRecord(value) &&
    typeof value['runId'] === 'string' &&
    isLoadStatus(value['status']) &&
    typeof value['startedAt'] === 'number' &&
    typeof value['completedAt'] === 'number' &&
    typeof value['elapsedMs'] === 'number' &&
    Array.isArray(value['writes']) &&
    Array.isArray(value['verifications']) &&
    (value['efficiency'] === null || isRecord(value['efficiency'])) &&
    (value['error'] === null || isRecord(value['error']))
  );
}
