import { describe, it, expect } from 'vitest';
import { parseJson } from '../../src/utils/parseJson.js';

describe('parseJson', () => {
  it('should return an already parsed object as-is', () => {
    const efficiency = { baseline: 'csv', datasets: [] };
    expect(parseJson(efficiency)).toBe(efficiency);
  });

  it('should parse a JSON object string', () => {
    expect(parseJson('{"kind":"WRITE_ERROR","context":{}}')).toEqual({ kind: 'WRITE_ERROR', context: {} });
  });

  it('should parse a JSON array string', () => {
    expect(parseJson('[{"format":"csv"},{"format":"parquet"}]')).toEqual([{ format: 'csv' }, { format: 'parquet' }]);
  });

  it('should return null as-is', () => {
    expect(parseJson(null)).toBeNull();
  });

  it('should throw on a string that is not JSON', () => {
    expect(() => parseJson('not json')).toThrow(SyntaxError);
  });
});
