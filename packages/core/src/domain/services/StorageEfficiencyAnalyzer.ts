import type { DatasetEfficiency, RepresentationEfficiency } from '../model/EfficiencyRecord.js';
import { LoadError } from '../errors/LoadError.js';

/** Byte counts keyed by representation (format) name. */
export type SizeMap = Readonly<Record<string, number>>;

/**
 * Computes compression ratios of several representations of the same logical
 * dataset relative to a baseline representation. Raw byte counts only; no
 * filesystem block overhead is accounted for.
 */
export class StorageEfficiencyAnalyzer {
  /**
   * `ratio(format) = sizes[baseline] / sizes[format]` for every format in `sizes`.
   * A format of size 0 has no ratio and is left out; the others are kept.
   *
   * @throws LoadError `DIVISION_ERROR` when the baseline is missing or empty.
   * @throws LoadError `INVALID_SIZE` when a size is negative or not finite.
   */
  analyze(sizes: SizeMap, baseline: string, dataset?: string): Record<string, number> {
    for (const [format, size] of Object.entries(sizes)) {
      if (!Number.isFinite(size) || size < 0) {
        throw new LoadError('INVALID_SIZE', `Size of '${format}' must be a non-negative number, got ${String(size)}`, {
          dataset,
          format,
        });
      }
    }

    const baselineSize = sizes[baseline];
    if (baselineSize === undefined) {
      throw new LoadError('DIVISION_ERROR', `Baseline representation '${baseline}' has no recorded size`, {
        dataset,
        format: baseline,
      });
    }
    if (baselineSize === 0) {
      throw new LoadError('DIVISION_ERROR', `Baseline representation '${baseline}' has size 0`, {
        dataset,
        format: baseline,
      });
    }

    const ratios: Record<string, number> = {};
    for (const [format, size] of Object.entries(sizes)) {
      if (size > 0) {
        ratios[format] = baselineSize / size;
      }
    }
    return ratios;
  }

  /**
   * Efficiency entry for one dataset. When the ratios cannot be computed the
   * sizes are still reported, with `ratio: null` and the structured error.
   */
  summarize(dataset: string, sizes: SizeMap, baseline: string): DatasetEfficiency {
    try {
      const ratios = this.analyze(sizes, baseline, dataset);
      return { dataset, representations: this.merge(sizes, ratios), error: null };
    } catch (error) {
      if (!(error instanceof LoadError)) throw error;
      return { dataset, representations: this.merge(sizes, {}), error: error.toJSON() };
    }
  }

  private merge(sizes: SizeMap, ratios: Readonly<Record<string, number>>): Record<string, RepresentationEfficiency> {
    const result: Record<string, RepresentationEfficiency> = {};
    for (const [format, sizeBytes] of Object.entries(sizes)) {
      result[format] = { sizeBytes, ratio: ratios[format] ?? null };
    }
    return result;
  }
}
