import { isLoadReport } from '@loadcheck/core';
import type { LoadReport } from '@loadcheck/core';
import type { LoadRunRow } from '../models/LoadRunModel.js';
import { parseJson } from '../utils/parseJson.js';

export function toRow(report: LoadReport): LoadRunRow {
  return {
    runId: report.runId,
    status: report.status,
    startedAt: report.startedAt,
    completedAt: report.completedAt,
    elapsedMs: report.elapsedMs,
    writes: report.writes,
    verifications: report.verifications,
    efficiency: report.efficiency,
    error: report.error,
  };
}

/** @throws Error when the row does not hold a well-formed report. */
export function toDomain(row: LoadRunRow): LoadReport {
  // BIGINT columns come back as strings on PostgreSQL and MySQL.
  const candidate = {
    runId: row.runId,
    status: row.status,
    startedAt: Number(row.startedAt),
    completedAt: Number(row.completedAt),
    elapsedMs: Number(row.elapsedMs),
    writes: parseJson(row.writes),
    verifications: parseJson(row.verifications),
    efficiency: parseJson(row.efficiency) ?? null,
    error: parseJson(row.error) ?? null,
  };

  if (!isLoadReport(candidate)) {
    throw new Error(`Row for run '${row.runId}' does not hold a load report`);
  }
  return candidate;
}
