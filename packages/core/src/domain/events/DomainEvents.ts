import type { LoadErrorInfo } from '../errors/LoadError.js';
import type { DatasetEfficiency } from '../model/EfficiencyRecord.js';
import type { LoadReport } from '../model/LoadReport.js';
import type { CopyVerification } from '../model/VerificationResult.js';

/** Emitted when `run()` starts, before the first write. */
export interface LoadStartedEvent {
  readonly type: 'load:started';
  readonly runId: string;
  readonly datasets: readonly string[];
  /** Number of (dataset, format) copies that will be written. */
  readonly totalCopies: number;
  readonly timestamp: number;
}

/** Emitted after a copy was written. */
export interface CopyWrittenEvent {
  readonly type: 'copy:written';
  readonly runId: string;
  readonly dataset: string;
  readonly format: string;
  readonly destination: string;
  readonly bytesWritten: number;
  readonly timestamp: number;
}

/** Emitted when an adapter fails to write a copy. The run fails right after. */
export interface CopyWriteFailedEvent {
  readonly type: 'copy:write-failed';
  readonly runId: string;
  readonly dataset: string;
  readonly format: string;
  readonly destination: string;
  readonly error: LoadErrorInfo;
  readonly timestamp: number;
}

/** Emitted once a copy has been read back and compared with its source. */
export interface CopyVerifiedEvent {
  readonly type: 'copy:verified';
  readonly runId: string;
  readonly verification: CopyVerification;
  readonly timestamp: number;
}

/** Emitted when a written copy cannot be read back. */
export interface CopyReadbackFailedEvent {
  readonly type: 'copy:readback-failed';
  readonly runId: string;
  readonly dataset: string;
  readonly format: string;
  readonly destination: string;
  readonly error: LoadErrorInfo;
  readonly timestamp: number;
}

/** Emitted per dataset when its compression ratios were computed. */
export interface EfficiencyAnalyzedEvent {
  readonly type: 'efficiency:analyzed';
  readonly runId: string;
  readonly efficiency: DatasetEfficiency;
  readonly timestamp: number;
}

/** Emitted per dataset when its compression ratios could not be computed. */
export interface EfficiencyFailedEvent {
  readonly type: 'efficiency:failed';
  readonly runId: string;
  readonly dataset: string;
  readonly error: LoadErrorInfo;
  readonly timestamp: number;
}

/** Emitted when the run reaches `COMPLETED`. */
export interface LoadCompletedEvent {
  readonly type: 'load:completed';
  readonly runId: string;
  readonly report: LoadReport;
  readonly timestamp: number;
}

/** Emitted when the run reaches `FAILED`, by a write error or a hard verification failure. */
export interface LoadFailedEvent {
  readonly type: 'load:failed';
  readonly runId: string;
  readonly report: LoadReport;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | LoadStartedEvent
  | CopyWrittenEvent
  | CopyWriteFailedEvent
  | CopyVerifiedEvent
  | CopyReadbackFailedEvent
  | EfficiencyAnalyzedEvent
  | EfficiencyFailedEvent
  | LoadCompletedEvent
  | LoadFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
