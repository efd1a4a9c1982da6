import type { DatasetEfficiency } from '../../domain/model/EfficiencyRecord.js';
import type { LoadContext } from '../LoadContext.js';

/** Use case: compute per-dataset compression ratios from the bytes each copy occupies. */
export class AnalyzeStorage {
  constructor(private readonly ctx: LoadContext) {}

  execute(): void {
    const { analyzer, baseline } = this.ctx.settings;
    const datasets: DatasetEfficiency[] = [];

    for (const [dataset, sizes] of this.sizesByDataset()) {
      const efficiency = analyzer.summarize(dataset, sizes, baseline);
      datasets.push(efficiency);

      if (efficiency.error) {
        this.ctx.logger.warn(`Storage efficiency of ${dataset} unavailable: ${efficiency.error.message}`);
        this.ctx.eventBus.emit({
          type: 'efficiency:failed',
          runId: this.ctx.runId,
          dataset,
          error: efficiency.error,
          timestamp: Date.now(),
        });
      } else {
        this.ctx.eventBus.emit({
          type: 'efficiency:analyzed',
          runId: this.ctx.runId,
          efficiency,
          timestamp: Date.now(),
        });
      }
    }

    this.ctx.efficiency = { baseline, datasets };
  }

  private sizesByDataset(): Map<string, Record<string, number>> {
    const grouped = new Map<string, Record<string, number>>();
    for (const copy of [...this.ctx.written].sort((a, b) => a.order - b.order)) {
      const sizes = grouped.get(copy.dataset.name) ?? {};
      sizes[copy.adapter.name] = copy.bytesWritten;
      grouped.set(copy.dataset.name, sizes);
    }
    return grouped;
  }
}
