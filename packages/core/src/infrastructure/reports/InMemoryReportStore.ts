import type { LoadReport } from '../../domain/model/LoadReport.js';
import type { ReportStore } from '../../domain/ports/ReportStore.js';

/** Non-persistent report store. Reports live as long as the process. */
export class InMemoryReportStore implements ReportStore {
  private readonly reports = new Map<string, LoadReport>();

  saveReport(report: LoadReport): Promise<void> {
    this.reports.set(report.runId, report);
    return Promise.resolve();
  }

  getReport(runId: string): Promise<LoadReport | null> {
    return Promise.resolve(this.reports.get(runId) ?? null);
  }

  listReports(): Promise<readonly LoadReport[]> {
    return Promise.resolve([...this.reports.values()].sort((a, b) => a.startedAt - b.startedAt));
  }
}
