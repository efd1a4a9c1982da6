import type { Dataset } from '../domain/model/Dataset.js';
import type { EfficiencyRecord } from '../domain/model/EfficiencyRecord.js';
import type { LoadReport, WriteOutcome } from '../domain/model/LoadReport.js';
import type { LoadStatus } from '../domain/model/LoadStatus.js';
import type { CopyVerification } from '../domain/model/VerificationResult.js';
import type { LoadErrorInfo } from '../domain/errors/LoadError.js';
import type { FormatAdapter } from '../domain/ports/FormatAdapter.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { ReportStore } from '../domain/ports/ReportStore.js';
import type { ConsistencyVerifier } from '../domain/services/ConsistencyVerifier.js';
import type { StorageEfficiencyAnalyzer } from '../domain/services/StorageEfficiencyAnalyzer.js';
import { canTransition } from '../domain/model/LoadStatus.js';
import { LoadError } from '../domain/errors/LoadError.js';
import type { EventBus } from './EventBus.js';
import type { DestinationLock } from './DestinationLock.js';

/** A (dataset, format) copy scheduled for writing. */
export interface PlannedCopy {
  /** Position in the load plan. */
  readonly order: number;
  readonly dataset: Dataset;
  readonly adapter: FormatAdapter;
  readonly destination: string;
}

/** A copy whose write succeeded. */
export interface WrittenCopy extends PlannedCopy {
  readonly bytesWritten: number;
}

/** Engine-wide collaborators and settings shared by every run. */
export interface LoadSettings {
  readonly adapters: ReadonlyMap<string, FormatAdapter>;
  readonly baseline: string;
  readonly parallelWrites: boolean;
  readonly verifier: ConsistencyVerifier;
  readonly analyzer: StorageEfficiencyAnalyzer;
  readonly reportStore: ReportStore;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  readonly lock: DestinationLock;
}

/**
 * Mutable state of a single load run, shared by the use cases of that run.
 *
 * Internal class, not exported from the public API. A fresh context is created
 * for every `run()`, so nothing leaks between runs.
 */
export class LoadContext {
  readonly runId: string;
  readonly startedAt: number;
  status: LoadStatus = 'INITIALIZED';
  copies: PlannedCopy[] = [];
  writes: WriteOutcome[] = [];
  written: WrittenCopy[] = [];
  verifications: CopyVerification[] = [];
  efficiency: EfficiencyRecord | null = null;
  error: LoadErrorInfo | null = null;

  constructor(readonly settings: LoadSettings) {
    this.runId = crypto.randomUUID();
    this.startedAt = Date.now();
  }

  get eventBus(): EventBus {
    return this.settings.eventBus;
  }

  get logger(): Logger {
    return this.settings.logger;
  }

  transitionTo(newStatus: LoadStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new LoadError('INVALID_TRANSITION', `Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.logger.debug(`Run ${this.runId}: ${this.status} → ${newStatus}`);
    this.status = newStatus;
  }

  /** `true` once any verification produced a hard failure. */
  hasFailedVerification(): boolean {
    return this.verifications.some((v) => v.verdict === 'fail');
  }

  buildReport(): LoadReport {
    const completedAt = Date.now();
    return {
      runId: this.runId,
      status: this.status,
      startedAt: this.startedAt,
      completedAt,
      elapsedMs: completedAt - this.startedAt,
      writes: [...this.writes],
      verifications: [...this.verifications],
      efficiency: this.efficiency,
      error: this.error,
    };
  }
}
