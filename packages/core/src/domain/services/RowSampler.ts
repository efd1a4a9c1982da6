/** How many rows content verification compares. */
export type VerificationMode = 'sample' | 'full';

/**
 * Deterministic row positions to compare.
 *
 * In `sample` mode: the first `sampleSize` rows, the last `sampleSize` rows and
 * `sampleSize` rows at a regular stride in between. When the dataset holds no
 * more than `3 * sampleSize` rows every row is returned. In `full` mode every
 * row is returned.
 *
 * Positions are unique and ascending.
 */
export function samplePositions(rowCount: number, sampleSize: number, mode: VerificationMode = 'sample'): number[] {
  if (rowCount <= 0) return [];
  if (mode === 'full' || rowCount <= sampleSize * 3) {
    return Array.from({ length: rowCount }, (_, i) => i);
  }

  const positions = new Set<number>();
  for (let i = 0; i < sampleSize; i++) {
    positions.add(i);
    positions.add(rowCount - 1 - i);
  }

  const stride = Math.floor(rowCount / (sampleSize + 1));
  for (let i = 1; i <= sampleSize; i++) {
    positions.add(i * stride);
  }

  return [...positions].sort((a, b) => a - b);
}
