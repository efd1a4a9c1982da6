import type { LoadInput } from './domain/model/LoadInput.js';
import type { LoadReport } from './domain/model/LoadReport.js';
import type { LoadStatus } from './domain/model/LoadStatus.js';
import type { FormatAdapter } from './domain/ports/FormatAdapter.js';
import type { Logger } from './domain/ports/Logger.js';
import type { ReportStore } from './domain/ports/ReportStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { VerificationMode } from './domain/services/RowSampler.js';
import { noopLogger } from './domain/ports/Logger.js';
import { LoadError } from './domain/errors/LoadError.js';
import { ConsistencyVerifier } from './domain/services/ConsistencyVerifier.js';
import { StorageEfficiencyAnalyzer } from './domain/services/StorageEfficiencyAnalyzer.js';
import { EventBus } from './application/EventBus.js';
import { DestinationLock } from './application/DestinationLock.js';
import { LoadContext } from './application/LoadContext.js';
import type { LoadSettings } from './application/LoadContext.js';
import { RunLoad } from './application/usecases/RunLoad.js';
import { InMemoryReportStore } from './infrastructure/reports/InMemoryReportStore.js';

/** Configuration for a load engine. */
export interface LoadEngineConfig {
  /** Format adapters, each registered under its `name`. At least one is required. */
  readonly adapters: readonly FormatAdapter[];
  /** Name of the format whose size every compression ratio is relative to. */
  readonly baseline: string;
  /** Rows compared at the start, the end and spread through the middle. Default: `5`. */
  readonly sampleSize?: number;
  /** `'sample'` compares sampled rows, `'full'` compares every row. Default: `'sample'`. */
  readonly verificationMode?: VerificationMode;
  /** Relative tolerance for float comparison. Default: `0` (exact after width normalisation). */
  readonly floatTolerance?: number;
  /** Cap on the content mismatches reported per copy. Default: `20`. */
  readonly maxReportedMismatches?: number;
  /** Write all copies concurrently. Writes to the same destination stay serialised. Default: `false`. */
  readonly parallelWrites?: boolean;
  /** Where finished reports are kept. Default: `InMemoryReportStore`. */
  readonly reportStore?: ReportStore;
  /** Default: a logger that discards everything. */
  readonly logger?: Logger;
}

/** Snapshot of the engine's current or most recent run. */
export interface LoadStatusResult {
  readonly runId: string | null;
  readonly status: LoadStatus;
  readonly copiesPlanned: number;
  readonly copiesWritten: number;
  readonly copiesVerified: number;
}

/**
 * Facade over the load stage: write every dataset through every configured
 * format, read each copy back and verify it, then measure storage efficiency.
 *
 * Each `run()` gets its own context and report; the engine itself is reusable.
 *
 * @example
 * ```typescript
 * const engine = new LoadEngine({
 *   adapters: [new CsvFormatAdapter(), new ParquetFormatAdapter()],
 *   baseline: 'csv',
 * });
 * const report = await engine.run([
 *   { dataset, destinations: { csv: 'out/full.csv', parquet: 'out/full.parquet' } },
 * ]);
 * ```
 */
export class LoadEngine {
  private readonly settings: LoadSettings;
  private current: LoadContext | null = null;

  constructor(config: LoadEngineConfig) {
    const logger = config.logger ?? noopLogger;
    this.settings = {
      adapters: LoadEngine.registerAdapters(config),
      baseline: config.baseline,
      parallelWrites: config.parallelWrites ?? false,
      verifier: new ConsistencyVerifier({
        sampleSize: config.sampleSize,
        mode: config.verificationMode,
        floatTolerance: config.floatTolerance,
        maxReportedMismatches: config.maxReportedMismatches,
      }),
      analyzer: new StorageEfficiencyAnalyzer(),
      reportStore: config.reportStore ?? new InMemoryReportStore(),
      eventBus: new EventBus(logger),
      logger,
      lock: new DestinationLock(),
    };
  }

  /**
   * Run the load stage for the given datasets.
   *
   * Resolves with the report of the run, whether it completed or failed.
   *
   * @throws LoadError `CONFIGURATION_ERROR` when an input names an unknown
   * format, repeats a dataset or a destination, or has no destinations.
   */
  async run(inputs: readonly LoadInput[]): Promise<LoadReport> {
    const ctx = new LoadContext(this.settings);
    this.current = ctx;
    return new RunLoad(ctx).execute(inputs);
  }

  /** Status of the run in progress, or of the last one. */
  getStatus(): LoadStatusResult {
    const ctx = this.current;
    return {
      runId: ctx?.runId ?? null,
      status: ctx?.status ?? 'INITIALIZED',
      copiesPlanned: ctx?.copies.length ?? 0,
      copiesWritten: ctx?.written.length ?? 0,
      copiesVerified: ctx?.verifications.length ?? 0,
    };
  }

  /** Fetch a persisted report from the configured report store. */
  async getReport(runId: string): Promise<LoadReport | null> {
    return this.settings.reportStore.getReport(runId);
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.settings.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.settings.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.settings.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.settings.eventBus.offAny(handler);
    return this;
  }

  private static registerAdapters(config: LoadEngineConfig): Map<string, FormatAdapter> {
    if (config.adapters.length === 0) {
      throw new LoadError('CONFIGURATION_ERROR', 'At least one format adapter is required');
    }

    const adapters = new Map<string, FormatAdapter>();
    for (const adapter of config.adapters) {
      if (adapters.has(adapter.name)) {
        throw new LoadError('CONFIGURATION_ERROR', `Format adapter '${adapter.name}' is registered twice`, {
          format: adapter.name,
        });
      }
      adapters.set(adapter.name, adapter);
    }

    if (!adapters.has(config.baseline)) {
      throw new LoadError('CONFIGURATION_ERROR', `Baseline format '${config.baseline}' has no registered adapter`, {
        format: config.baseline,
      });
    }
    return adapters;
  }
}
