import { LoadError } from '../../domain/errors/LoadError.js';
import { getHardFailures, getSoftFailures } from '../../domain/model/VerificationResult.js';
import type { CopyVerification, VerificationResult } from '../../domain/model/VerificationResult.js';
import type { Dataset } from '../../domain/model/Dataset.js';
import type { LoadContext, WrittenCopy } from '../LoadContext.js';

/**
 * Use case: read every written copy back and compare it with its source.
 *
 * Copies are verified in plan order, one at a time. A copy that cannot be read
 * back gets a failing `READBACK_ERROR` verification; the others still run.
 */
export class VerifyCopies {
  constructor(private readonly ctx: LoadContext) {}

  async execute(): Promise<void> {
    for (const copy of this.inPlanOrder()) {
      const verification = await this.verifyOne(copy);
      this.ctx.verifications.push(verification);
      this.log(verification);
      this.ctx.eventBus.emit({
        type: 'copy:verified',
        runId: this.ctx.runId,
        verification,
        timestamp: Date.now(),
      });
    }
  }

  private async verifyOne(copy: WrittenCopy): Promise<CopyVerification> {
    const { dataset, adapter, destination } = copy;
    let target: Dataset;
    try {
      target = await this.ctx.settings.lock.run(destination, () => adapter.read(destination));
    } catch (error) {
      const info = LoadError.wrap('READBACK_ERROR', error, {
        dataset: dataset.name,
        format: adapter.name,
        destination,
      }).toJSON();
      this.ctx.logger.error(`Failed to read back ${dataset.name} from ${destination}`, error);
      this.ctx.eventBus.emit({
        type: 'copy:readback-failed',
        runId: this.ctx.runId,
        dataset: dataset.name,
        format: adapter.name,
        destination,
        error: info,
        timestamp: Date.now(),
      });
      const failed = this.ctx.settings.verifier.readbackFailed(dataset, adapter.name, info.message);
      return this.withDestination(failed, destination);
    }

    const result = this.ctx.settings.verifier.verify(dataset, target, adapter.name, adapter.declaredCoercions);
    return this.withDestination(result, destination);
  }

  private withDestination(result: VerificationResult, destination: string): CopyVerification {
    return { ...result, destination };
  }

  private inPlanOrder(): WrittenCopy[] {
    return [...this.ctx.written].sort((a, b) => a.order - b.order);
  }

  private log(verification: CopyVerification): void {
    const label = `${verification.dataset} (${verification.format})`;
    for (const finding of getHardFailures(verification.findings)) {
      this.ctx.logger.error(`Verification of ${label}: ${finding.message}`);
    }
    for (const finding of getSoftFailures(verification.findings)) {
      this.ctx.logger.warn(`Verification of ${label}: ${finding.message}`);
    }
    this.ctx.logger.info(`Verified ${label}: ${verification.verdict}`);
  }
}
