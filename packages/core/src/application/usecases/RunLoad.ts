import type { LoadInput } from '../../domain/model/LoadInput.js';
import type { LoadReport } from '../../domain/model/LoadReport.js';
import { LoadError } from '../../domain/errors/LoadError.js';
import type { LoadContext, PlannedCopy } from '../LoadContext.js';
import { WriteCopies } from './WriteCopies.js';
import { VerifyCopies } from './VerifyCopies.js';
import { AnalyzeStorage } from './AnalyzeStorage.js';

/**
 * Use case: drive one load run through WRITING → VERIFYING → ANALYZING to a
 * terminal status, persist the report and announce the outcome.
 *
 * Misconfigured inputs are rejected before the run starts. Once started, the
 * run always resolves with a report, failed or not.
 */
export class RunLoad {
  constructor(private readonly ctx: LoadContext) {}

  async execute(inputs: readonly LoadInput[]): Promise<LoadReport> {
    this.ctx.copies = this.plan(inputs);
    this.ctx.transitionTo('WRITING');

    this.ctx.logger.info(`Load ${this.ctx.runId} started: ${this.ctx.copies.length} copies`);
    this.ctx.eventBus.emit({
      type: 'load:started',
      runId: this.ctx.runId,
      datasets: inputs.map((input) => input.dataset.name),
      totalCopies: this.ctx.copies.length,
      timestamp: Date.now(),
    });

    const allWritten = await new WriteCopies(this.ctx).execute();

    if (!allWritten) {
      this.ctx.transitionTo('FAILED');
    } else {
      this.ctx.transitionTo('VERIFYING');
      await new VerifyCopies(this.ctx).execute();

      this.ctx.transitionTo('ANALYZING');
      new AnalyzeStorage(this.ctx).execute();

      this.ctx.transitionTo(this.ctx.hasFailedVerification() ? 'FAILED' : 'COMPLETED');
    }

    const report = this.ctx.buildReport();
    await this.ctx.settings.reportStore.saveReport(report);

    if (report.status === 'COMPLETED') {
      this.ctx.logger.info(`Load ${report.runId} completed in ${report.elapsedMs}ms`);
      this.ctx.eventBus.emit({ type: 'load:completed', runId: report.runId, report, timestamp: Date.now() });
    } else {
      this.ctx.logger.error(`Load ${report.runId} failed`, report.error ?? undefined);
      this.ctx.eventBus.emit({ type: 'load:failed', runId: report.runId, report, timestamp: Date.now() });
    }
    return report;
  }

  private plan(inputs: readonly LoadInput[]): PlannedCopy[] {
    if (inputs.length === 0) {
      throw new LoadError('CONFIGURATION_ERROR', 'At least one dataset must be loaded');
    }

    const copies: PlannedCopy[] = [];
    const datasetNames = new Set<string>();
    const targets = new Set<string>();

    for (const { dataset, destinations } of inputs) {
      if (datasetNames.has(dataset.name)) {
        throw new LoadError('CONFIGURATION_ERROR', `Dataset '${dataset.name}' is loaded more than once`, {
          dataset: dataset.name,
        });
      }
      datasetNames.add(dataset.name);

      const formats = Object.keys(destinations);
      if (formats.length === 0) {
        throw new LoadError('CONFIGURATION_ERROR', `Dataset '${dataset.name}' has no destinations`, {
          dataset: dataset.name,
        });
      }

      for (const format of formats) {
        const destination = destinations[format];
        const adapter = this.ctx.settings.adapters.get(format);
        if (!adapter) {
          throw new LoadError('CONFIGURATION_ERROR', `No adapter registered for format '${format}'`, {
            dataset: dataset.name,
            format,
          });
        }
        if (destination === undefined || destination === '') {
          throw new LoadError('CONFIGURATION_ERROR', `Empty destination for '${dataset.name}' as ${format}`, {
            dataset: dataset.name,
            format,
          });
        }

        const target = `${format}\u0000${destination}`;
        if (targets.has(target)) {
          throw new LoadError(
            'CONFIGURATION_ERROR',
            `Destination '${destination}' is used by more than one ${format} copy`,
            { dataset: dataset.name, format, destination },
          );
        }
        targets.add(target);

        copies.push({ order: copies.length, dataset, adapter, destination });
      }
    }
    return copies;
  }
}
