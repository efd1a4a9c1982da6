import { LoadError } from '../../domain/errors/LoadError.js';
import type { LoadContext, PlannedCopy } from '../LoadContext.js';

/**
 * Use case: persist every planned copy through its adapter.
 *
 * Stops at the first failing write. In parallel mode copies already in flight
 * are allowed to settle, but no new write is started once one has failed.
 */
export class WriteCopies {
  private failed = false;

  constructor(private readonly ctx: LoadContext) {}

  /** Resolves to `true` when every copy was written. */
  async execute(): Promise<boolean> {
    if (this.ctx.settings.parallelWrites) {
      return this.writeInParallel();
    }
    return this.writeSequentially();
  }

  private async writeSequentially(): Promise<boolean> {
    for (const copy of this.ctx.copies) {
      await this.writeOne(copy);
      if (this.failed) return false;
    }
    return true;
  }

  private async writeInParallel(): Promise<boolean> {
    await Promise.all(this.ctx.copies.map((copy) => this.writeOne(copy)));
    return !this.failed;
  }

  private async writeOne(copy: PlannedCopy): Promise<void> {
    const { dataset, adapter, destination } = copy;
    const context = { dataset: dataset.name, format: adapter.name, destination };

    try {
      const bytesWritten = await this.ctx.settings.lock.run(destination, async () => {
        // Another copy failed while this one was queued.
        if (this.failed) return null;
        return adapter.write(dataset, destination);
      });
      if (bytesWritten === null) return;

      this.ctx.writes.push({ ...context, bytesWritten, error: null });
      this.ctx.written.push({ ...copy, bytesWritten });
      this.ctx.logger.info(`Wrote ${dataset.name} as ${adapter.name} to ${destination} (${bytesWritten} bytes)`);
      this.ctx.eventBus.emit({
        type: 'copy:written',
        runId: this.ctx.runId,
        ...context,
        bytesWritten,
        timestamp: Date.now(),
      });
    } catch (error) {
      this.failed = true;
      const info = LoadError.wrap('WRITE_ERROR', error, context).toJSON();
      this.ctx.writes.push({ ...context, bytesWritten: null, error: info });
      this.ctx.error ??= info;
      this.ctx.logger.error(`Failed to write ${dataset.name} as ${adapter.name} to ${destination}`, error);
      this.ctx.eventBus.emit({
        type: 'copy:write-failed',
        runId: this.ctx.runId,
        ...context,
        error: info,
        timestamp: Date.now(),
      });
    }
  }
}
