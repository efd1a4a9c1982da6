import { LoadError } from '../errors/LoadError.js';
import { ColumnType, isCompatibleType } from '../model/ColumnType.js';
import type { Column, Dataset } from '../model/Dataset.js';
import { findColumn } from '../model/Dataset.js';
import type {
  ColumnTypeCheck,
  VerificationFinding,
  VerificationResult,
} from '../model/VerificationResult.js';
import { verdictOf } from '../model/VerificationResult.js';
import type { TypeCoercions } from '../ports/FormatAdapter.js';
import type { VerificationMode } from './RowSampler.js';
import { samplePositions } from './RowSampler.js';
import { normalizeValue, valuesEqual } from './ValueNormalizer.js';

export interface ConsistencyVerifierOptions {
  /** Rows taken from the head, the tail and the stride each; a positive integer. Default: `5`. */
  readonly sampleSize?: number;
  /** `'full'` compares every row. Default: `'sample'`. */
  readonly mode?: VerificationMode;
  /** Relative tolerance for numeric comparison. Default: `0` (exact). */
  readonly floatTolerance?: number;
  /** Cap on `CONTENT_MISMATCH` findings kept per copy (at least 1); the count is never capped. Default: `20`. */
  readonly maxReportedMismatches?: number;
}

interface TypeCheckOutcome {
  readonly checks: ColumnTypeCheck[];
  readonly findings: VerificationFinding[];
  readonly comparable: Set<string>;
}

/**
 * Compares a persisted copy with its source dataset.
 *
 * Runs every check (record count, column set, column order, types, content
 * sample) and collects all findings before computing the verdict. The verdict
 * is `pass` iff no finding has severity `error`.
 */
export class ConsistencyVerifier {
  readonly sampleSize: number;
  readonly mode: VerificationMode;
  readonly floatTolerance: number;
  readonly maxReportedMismatches: number;

  constructor(options: ConsistencyVerifierOptions = {}) {
    const sampleSize = options.sampleSize ?? 5;
    if (!Number.isInteger(sampleSize) || sampleSize < 1) {
      throw new LoadError('CONFIGURATION_ERROR', `sampleSize must be a positive integer, got ${String(sampleSize)}`);
    }
    this.sampleSize = sampleSize;
    this.mode = options.mode ?? 'sample';
    this.floatTolerance = options.floatTolerance ?? 0;
    this.maxReportedMismatches = Math.max(1, options.maxReportedMismatches ?? 20);
  }

  verify(source: Dataset, target: Dataset, formatName: string, coercions: TypeCoercions = {}): VerificationResult {
    const base = { dataset: source.name, format: formatName };
    const findings: VerificationFinding[] = [];

    if (target.rowCount !== source.rowCount) {
      findings.push({
        ...base,
        code: 'COUNT_MISMATCH',
        severity: 'error',
        message: `Expected ${String(source.rowCount)} records, found ${String(target.rowCount)}`,
        metadata: { expected: source.rowCount, actual: target.rowCount },
      });
    }

    const sourceNames = source.columns.map((c) => c.name);
    const targetNames = target.columns.map((c) => c.name);
    const targetSet = new Set(targetNames);
    const sourceSet = new Set(sourceNames);

    for (const name of sourceNames) {
      if (!targetSet.has(name)) {
        findings.push({
          ...base,
          code: 'SCHEMA_MISMATCH',
          severity: 'error',
          column: name,
          message: `Column '${name}' is missing from the copy`,
          metadata: { reason: 'missing' },
        });
      }
    }
    for (const name of targetNames) {
      if (!sourceSet.has(name)) {
        findings.push({
          ...base,
          code: 'SCHEMA_MISMATCH',
          severity: 'error',
          column: name,
          message: `Column '${name}' does not exist in the source`,
          metadata: { reason: 'extra' },
        });
      }
    }
    const schemaMatch = sourceSet.size === targetSet.size && sourceNames.every((n) => targetSet.has(n));

    const sharedInSourceOrder = sourceNames.filter((n) => targetSet.has(n));
    const sharedInTargetOrder = targetNames.filter((n) => sourceSet.has(n));
    const columnOrderMatch = sharedInSourceOrder.every((n, i) => sharedInTargetOrder[i] === n);
    if (!columnOrderMatch) {
      findings.push({
        ...base,
        code: 'COLUMN_ORDER_MISMATCH',
        severity: 'warning',
        message: `Column order differs: expected [${sharedInSourceOrder.join(', ')}], found [${sharedInTargetOrder.join(', ')}]`,
      });
    }

    const types = this.checkTypes(source, target, sharedInSourceOrder, coercions, base);
    findings.push(...types.findings);

    const content = this.compareContent(source, target, types.comparable, base);
    findings.push(...content.findings);

    return {
      ...base,
      sourceRecordCount: source.rowCount,
      targetRecordCount: target.rowCount,
      schemaMatch,
      columnOrderMatch,
      columnTypes: types.checks,
      sampledRows: content.sampledRows,
      sampleMismatchCount: content.mismatchCount,
      findings,
      verdict: verdictOf(findings),
    };
  }

  /** Result for a copy that could not be read back: a single hard `READBACK_ERROR`. */
  readbackFailed(source: Dataset, formatName: string, message: string): VerificationResult {
    const findings: VerificationFinding[] = [
      {
        dataset: source.name,
        format: formatName,
        code: 'READBACK_ERROR',
        severity: 'error',
        message,
      },
    ];
    return {
      dataset: source.name,
      format: formatName,
      sourceRecordCount: source.rowCount,
      targetRecordCount: null,
      schemaMatch: false,
      columnOrderMatch: false,
      columnTypes: [],
      sampledRows: 0,
      sampleMismatchCount: 0,
      findings,
      verdict: 'fail',
    };
  }

  private checkTypes(
    source: Dataset,
    target: Dataset,
    shared: readonly string[],
    coercions: TypeCoercions,
    base: { dataset: string; format: string },
  ): TypeCheckOutcome {
    const checks: ColumnTypeCheck[] = [];
    const findings: VerificationFinding[] = [];
    const comparable = new Set<string>();

    for (const name of shared) {
      const sourceType = typeOf(source, name);
      const targetType = typeOf(target, name);
      if (sourceType === undefined || targetType === undefined) continue;

      if (sourceType === targetType) {
        checks.push({ column: name, sourceType, targetType, status: 'exact' });
        comparable.add(name);
        continue;
      }

      // Schema-less formats type an empty column as text; there is nothing to contradict the source.
      if (targetType === ColumnType.TEXT && !hasValues(target, name)) {
        checks.push({ column: name, sourceType, targetType, status: 'untyped' });
        comparable.add(name);
        continue;
      }

      if (coercions[sourceType] === targetType) {
        checks.push({ column: name, sourceType, targetType, status: 'coerced' });
        findings.push({
          ...base,
          code: 'TYPE_COERCION',
          severity: 'warning',
          column: name,
          message: `Column '${name}' stored as ${targetType} instead of ${sourceType} (declared by format)`,
          metadata: { sourceType, targetType },
        });
        comparable.add(name);
        continue;
      }

      if (isCompatibleType(sourceType, targetType)) {
        checks.push({ column: name, sourceType, targetType, status: 'width_mismatch' });
        findings.push({
          ...base,
          code: 'TYPE_WIDTH_MISMATCH',
          severity: 'warning',
          column: name,
          message: `Column '${name}' is ${targetType} in the copy, ${sourceType} in the source`,
          metadata: { sourceType, targetType },
        });
        comparable.add(name);
        continue;
      }

      checks.push({ column: name, sourceType, targetType, status: 'incompatible' });
      findings.push({
        ...base,
        code: 'TYPE_MISMATCH',
        severity: 'error',
        column: name,
        message: `Column '${name}' is ${targetType} in the copy, incompatible with source type ${sourceType}`,
        metadata: { sourceType, targetType },
      });
    }

    return { checks, findings, comparable };
  }

  private compareContent(
    source: Dataset,
    target: Dataset,
    comparable: ReadonlySet<string>,
    base: { dataset: string; format: string },
  ): { sampledRows: number; mismatchCount: number; findings: VerificationFinding[] } {
    const positions = samplePositions(source.rowCount, this.sampleSize, this.mode).filter(
      (p) => p < target.rowCount,
    );
    const pairs: Array<{ source: Column; target: Column }> = [];
    for (const column of source.columns) {
      if (!comparable.has(column.name)) continue;
      const other = findColumn(target, column.name);
      if (other) pairs.push({ source: column, target: other });
    }

    const findings: VerificationFinding[] = [];
    let mismatchCount = 0;

    for (const row of positions) {
      for (const pair of pairs) {
        const expected = normalizeValue(pair.source.values[row] ?? null, pair.source.type);
        const actual = normalizeValue(pair.target.values[row] ?? null, pair.source.type);
        if (valuesEqual(expected, actual, this.floatTolerance)) continue;

        mismatchCount++;
        if (findings.length < this.maxReportedMismatches) {
          findings.push({
            ...base,
            code: 'CONTENT_MISMATCH',
            severity: 'error',
            column: pair.source.name,
            row,
            message: `Value mismatch in column '${pair.source.name}' at row ${String(row)}`,
            metadata: { expected, actual },
          });
        }
      }
    }

    return { sampledRows: positions.length, mismatchCount, findings };
  }
}

function typeOf(dataset: Dataset, name: string): ColumnType | undefined {
  return findColumn(dataset, name)?.type;
}

function hasValues(dataset: Dataset, name: string): boolean {
  return findColumn(dataset, name)?.values.some((v) => v !== null && v !== '') ?? false;
}
