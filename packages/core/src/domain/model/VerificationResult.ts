import type { ColumnType } from './ColumnType.js';

/** Finding codes produced by consistency verification. */
export type FindingCode =
  | 'COUNT_MISMATCH'
  | 'SCHEMA_MISMATCH'
  | 'COLUMN_ORDER_MISMATCH'
  | 'TYPE_MISMATCH'
  | 'TYPE_WIDTH_MISMATCH'
  | 'TYPE_COERCION'
  | 'CONTENT_MISMATCH'
  | 'READBACK_ERROR';

/** `error` findings are hard failures and fail the copy; `warning` findings are soft. */
export type FindingSeverity = 'error' | 'warning';

/** A single structured verification finding. */
export interface VerificationFinding {
  readonly code: FindingCode;
  readonly severity: FindingSeverity;
  readonly dataset: string;
  readonly format: string;
  readonly message: string;
  readonly column?: string;
  /** Zero-based row position for content mismatches. */
  readonly row?: number;
  /** Structured detail (expected/actual values, counts). Primitive values only. */
  readonly metadata?: Readonly<Record<string, string | number | boolean | null>>;
}

/**
 * Outcome of comparing one column's type between source and copy. `untyped`
 * means the copy holds no value the column type could be inferred from.
 */
export type TypeCheckStatus = 'exact' | 'coerced' | 'width_mismatch' | 'incompatible' | 'untyped';

export interface ColumnTypeCheck {
  readonly column: string;
  readonly sourceType: ColumnType;
  readonly targetType: ColumnType;
  readonly status: TypeCheckStatus;
}

export type Verdict = 'pass' | 'fail';

/** Result of verifying one persisted copy against its source dataset. */
export interface VerificationResult {
  readonly dataset: string;
  readonly format: string;
  readonly sourceRecordCount: number;
  /** `null` when the copy could not be read back. */
  readonly targetRecordCount: number | null;
  /** Column-name sets are equal. */
  readonly schemaMatch: boolean;
  /** Shared columns appear in the same order. */
  readonly columnOrderMatch: boolean;
  readonly columnTypes: readonly ColumnTypeCheck[];
  /** Number of row positions compared. */
  readonly sampledRows: number;
  /** Number of differing cells at the compared positions. */
  readonly sampleMismatchCount: number;
  readonly findings: readonly VerificationFinding[];
  readonly verdict: Verdict;
}

/** Verification of a copy together with where it was written. */
export interface CopyVerification extends VerificationResult {
  readonly destination: string;
}

/** `true` if at least one finding is a hard failure. */
export function hasHardFailures(findings: readonly VerificationFinding[]): boolean {
  return findings.some((f) => f.severity === 'error');
}

export function getHardFailures(findings: readonly VerificationFinding[]): readonly VerificationFinding[] {
  return findings.filter((f) => f.severity === 'error');
}

export function getSoftFailures(findings: readonly VerificationFinding[]): readonly VerificationFinding[] {
  return findings.filter((f) => f.severity === 'warning');
}

/** Verdict implied by a list of findings. */
export function verdictOf(findings: readonly VerificationFinding[]): Verdict {
  return hasHardFailures(findings) ? 'fail' : 'pass';
}
