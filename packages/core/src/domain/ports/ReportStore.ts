import type { LoadReport } from '../model/LoadReport.js';

/**
 * Port for archiving load reports as an audit log.
 *
 * The engine saves the report of every run, failed or not, once the run
 * reaches a terminal state. The default `InMemoryReportStore` is non-persistent.
 */
export interface ReportStore {
  /** Persist a report. Saving the same `runId` twice replaces the earlier report. */
  saveReport(report: LoadReport): Promise<void>;
  /** Retrieve a report by run ID. */
  getReport(runId: string): Promise<LoadReport | null>;
  /** All stored reports, oldest first. */
  listReports(): Promise<readonly LoadReport[]>;
}
