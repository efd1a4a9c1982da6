import { writeFile, readFile, readdir, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { LoadReport } from '../../domain/model/LoadReport.js';
import { isLoadReport } from '../../domain/model/LoadReport.js';
import type { ReportStore } from '../../domain/ports/ReportStore.js';

export interface FileReportStoreOptions {
  /** Directory where report files are stored. Default: `'.loadcheck'`. */
  readonly directory?: string;
}

const RUN_ID_PATTERN = /^[\w-]+$/;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Report store that keeps one `{runId}.json` file per run.
 *
 * Node.js only.
 */
export class FileReportStore implements ReportStore {
  private readonly directory: string;

  constructor(options?: FileReportStoreOptions) {
    this.directory = options?.directory ?? '.loadcheck';
  }

  async saveReport(report: LoadReport): Promise<void> {
    if (!RUN_ID_PATTERN.test(report.runId)) {
      throw new Error(`Run ID '${report.runId}' cannot be used as a file name`);
    }
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.reportFilePath(report.runId), JSON.stringify(report, null, 2), 'utf-8');
  }

  async getReport(runId: string): Promise<LoadReport | null> {
    if (!RUN_ID_PATTERN.test(runId)) return null;
    return this.readReport(this.reportFilePath(runId));
  }

  async listReports(): Promise<readonly LoadReport[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const reports: LoadReport[] = [];
    for (const entry of entries.filter((name) => name.endsWith('.json'))) {
      const report = await this.readReport(join(this.directory, entry));
      if (report) reports.push(report);
    }
    return reports.sort((a, b) => a.startedAt - b.startedAt || a.completedAt - b.completedAt);
  }

  private async readReport(filePath: string): Promise<LoadReport | null> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isLoadReport(parsed)) {
      throw new Error(`File '${filePath}' does not contain a load report`);
    }
    return parsed;
  }

  private reportFilePath(runId: string): string {
    return join(this.directory, `${runId}.json`);
  }
}
