import { describe, it, expect } from 'vitest';
import { ConsistencyVerifier } from '../../../src/domain/services/ConsistencyVerifier.js';
import { createDataset } from '../../../src/domain/model/Dataset.js';
import { LoadError } from '../../../src/domain/errors/LoadError.js';
import { getHardFailures, getSoftFailures } from '../../../src/domain/model/VerificationResult.js';
import { column, peopleDataset, syntheticDataset, truncate } from '../../fixtures.js';

describe('ConsistencyVerifier', () => {
  const verifier = new ConsistencyVerifier();

  it('should pass an identical copy without findings', () => {
    const result = verifier.verify(peopleDataset(), peopleDataset('copy'), 'memory');

    expect(result.verdict).toBe('pass');
    expect(result.findings).toEqual([]);
    expect(result.dataset).toBe('full');
    expect(result.format).toBe('memory');
    expect(result.sourceRecordCount).toBe(3);
    expect(result.targetRecordCount).toBe(3);
    expect(result.schemaMatch).toBe(true);
    expect(result.columnOrderMatch).toBe(true);
    expect(result.sampledRows).toBe(3);
    expect(result.sampleMismatchCount).toBe(0);
    expect(result.columnTypes.map((c) => c.status)).toEqual(['exact', 'exact', 'exact']);
  });

  describe('record count', () => {
    it('should fail a copy missing its last row', () => {
      const source = syntheticDataset('full', 1000);
      const result = verifier.verify(source, truncate(source, 999), 'parquet');

      expect(result.verdict).toBe('fail');
      expect(result.targetRecordCount).toBe(999);
      const [countFinding] = getHardFailures(result.findings);
      expect(countFinding).toMatchObject({
        code: 'COUNT_MISMATCH',
        severity: 'error',
        dataset: 'full',
        format: 'parquet',
        metadata: { expected: 1000, actual: 999 },
      });
    });

    it('should only compare positions present in both datasets', () => {
      const source = syntheticDataset('full', 1000);
      const result = verifier.verify(source, truncate(source, 999), 'parquet');

      // 15 sampled positions, 999 is out of range for the copy
      expect(result.sampledRows).toBe(14);
      expect(result.sampleMismatchCount).toBe(0);
      expect(result.findings.map((f) => f.code)).toEqual(['COUNT_MISMATCH']);
    });
  });

  describe('schema', () => {
    it('should report missing and extra columns as hard failures', () => {
      const source = peopleDataset();
      const target = createDataset('copy', [
        column('id', 'int64', [1, 2, 3]),
        column('name', 'text', ['Ada', 'Grace', 'Linus']),
        column('notes', 'text', [null, null, null]),
      ]);

      const result = verifier.verify(source, target, 'memory');

      expect(result.schemaMatch).toBe(false);
      expect(result.verdict).toBe('fail');
      expect(result.findings).toEqual([
        expect.objectContaining({ code: 'SCHEMA_MISMATCH', column: 'score', metadata: { reason: 'missing' } }),
        expect.objectContaining({ code: 'SCHEMA_MISMATCH', column: 'notes', metadata: { reason: 'extra' } }),
      ]);
    });

    it('should report a different column order as a soft failure', () => {
      const source = peopleDataset();
      const target = createDataset('copy', [
        column('score', 'float64', [9.5, 7.25, 8]),
        column('id', 'int64', [1, 2, 3]),
        column('name', 'text', ['Ada', 'Grace', 'Linus']),
      ]);

      const result = verifier.verify(source, target, 'memory');

      expect(result.verdict).toBe('pass');
      expect(result.schemaMatch).toBe(true);
      expect(result.columnOrderMatch).toBe(false);
      expect(getSoftFailures(result.findings).map((f) => f.code)).toEqual(['COLUMN_ORDER_MISMATCH']);
    });
  });

  describe('types', () => {
    it('should accept coercions declared by the format as soft findings', () => {
      const source = createDataset('full', [column('n', 'int32', [1, 2])]);
      const target = createDataset('copy', [column('n', 'int64', [1, 2])]);

      const result = verifier.verify(source, target, 'csv', { int32: 'int64' });

      expect(result.verdict).toBe('pass');
      expect(result.columnTypes).toEqual([{ column: 'n', sourceType: 'int32', targetType: 'int64', status: 'coerced' }]);
      expect(result.findings).toEqual([
        expect.objectContaining({ code: 'TYPE_COERCION', severity: 'warning', column: 'n' }),
      ]);
    });

    it('should report an undeclared width change within a category as a soft finding', () => {
      const source = createDataset('full', [column('n', 'float64', [1, 2])]);
      const target = createDataset('copy', [column('n', 'int64', [1, 2])]);

      const result = verifier.verify(source, target, 'csv');

      expect(result.verdict).toBe('pass');
      expect(result.findings.map((f) => f.code)).toEqual(['TYPE_WIDTH_MISMATCH']);
    });

    it('should not fail a column the copy could not type because it holds no values', () => {
      const source = createDataset('full', [column('n', 'int64', [null, null])]);
      const target = createDataset('copy', [column('n', 'text', [null, null])]);

      const result = verifier.verify(source, target, 'csv');

      expect(result.verdict).toBe('pass');
      expect(result.columnTypes[0]?.status).toBe('untyped');
      expect(result.findings).toEqual([]);
    });

    it('should fail incompatible types and skip their content', () => {
      const source = createDataset('full', [column('code', 'text', ['a', 'b'])]);
      const target = createDataset('copy', [column('code', 'int64', [1, 2])]);

      const result = verifier.verify(source, target, 'memory');

      expect(result.verdict).toBe('fail');
      expect(result.findings.map((f) => f.code)).toEqual(['TYPE_MISMATCH']);
      expect(result.sampleMismatchCount).toBe(0);
    });
  });

  describe('content', () => {
    it('should report the row, column and values of a mismatch', () => {
      const source = peopleDataset();
      const target = createDataset('copy', [
        column('id', 'int64', [1, 2, 3]),
        column('name', 'text', ['Ada', 'Grace', 'Linux']),
        column('score', 'float64', [9.5, 7.25, 8]),
      ]);

      const result = verifier.verify(source, target, 'memory');

      expect(result.verdict).toBe('fail');
      expect(result.sampleMismatchCount).toBe(1);
      expect(result.findings).toEqual([
        {
          code: 'CONTENT_MISMATCH',
          severity: 'error',
          dataset: 'full',
          format: 'memory',
          column: 'name',
          row: 2,
          message: "Value mismatch in column 'name' at row 2",
          metadata: { expected: 'Linus', actual: 'Linux' },
        },
      ]);
    });

    it('should accept float drift within the configured tolerance', () => {
      const source = createDataset('full', [column('x', 'float64', [1.0, 2.0])]);
      const target = createDataset('copy', [column('x', 'float64', [1.0000001, 2.0])]);

      expect(verifier.verify(source, target, 'memory').verdict).toBe('fail');
      expect(new ConsistencyVerifier({ floatTolerance: 1e-6 }).verify(source, target, 'memory').verdict).toBe('pass');
    });

    it('should count every mismatch but cap reported findings', () => {
      const source = createDataset('full', [column('v', 'int64', [1, 2, 3, 4, 5, 6])]);
      const target = createDataset('copy', [column('v', 'int64', [0, 0, 0, 0, 0, 0])]);

      const result = new ConsistencyVerifier({ maxReportedMismatches: 2 }).verify(source, target, 'memory');

      expect(result.sampleMismatchCount).toBe(6);
      expect(result.findings).toHaveLength(2);
      expect(result.findings.map((f) => f.row)).toEqual([0, 1]);
    });

    it('should only compare sampled rows, or every row in full mode', () => {
      const source = createDataset('full', [column('v', 'int64', Array.from({ length: 100 }, (_, i) => i))]);
      // row 10 is not among the sampled positions (0-4, 16, 32, 48, 64, 80, 95-99)
      const target = createDataset('copy', [
        column('v', 'int64', Array.from({ length: 100 }, (_, i) => (i === 10 ? -1 : i))),
      ]);

      expect(verifier.verify(source, target, 'memory').verdict).toBe('pass');

      const full = new ConsistencyVerifier({ mode: 'full' }).verify(source, target, 'memory');
      expect(full.verdict).toBe('fail');
      expect(full.sampledRows).toBe(100);
      expect(full.findings.map((f) => f.row)).toEqual([10]);
    });
  });

  it('should reject a sample size that would compare no rows', () => {
    expect(() => new ConsistencyVerifier({ sampleSize: 0 })).toThrow('sampleSize must be a positive integer, got 0');
    expect(() => new ConsistencyVerifier({ sampleSize: -1 })).toThrow('sampleSize must be a positive integer, got -1');
    expect(() => new ConsistencyVerifier({ sampleSize: Number.NaN })).toThrow(
      'sampleSize must be a positive integer, got NaN',
    );
    expect(() => new ConsistencyVerifier({ sampleSize: 2.5 })).toThrow(LoadError);
  });

  it('should build a failing result for a copy that cannot be read back', () => {
    const result = verifier.readbackFailed(peopleDataset(), 'parquet', 'file is corrupt');

    expect(result).toEqual({
      dataset: 'full',
      format: 'parquet',
      sourceRecordCount: 3,
      targetRecordCount: null,
      schemaMatch: false,
      columnOrderMatch: false,
      columnTypes: [],
      sampledRows: 0,
      sampleMismatchCount: 0,
      findings: [
        { dataset: 'full', format: 'parquet', code: 'READBACK_ERROR', severity: 'error', message: 'file is corrupt' },
      ],
      verdict: 'fail',
    });
  });
});
