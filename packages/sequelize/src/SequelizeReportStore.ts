import type { Sequelize } from 'sequelize';
import type { LoadReport, ReportStore } from '@loadcheck/core';
import { defineLoadRunModel } from './models/LoadRunModel.js';
import type { LoadRunModel, LoadRunRow } from './models/LoadRunModel.js';
import * as ReportMapper from './mappers/ReportMapper.js';

export interface SequelizeReportStoreOptions {
  /** Prefix of the report table name. Default: `'loadcheck_'`. */
  readonly tablePrefix?: string;
}

/**
 * Sequelize-based ReportStore for `@loadcheck/core`: one row per run in
 * `<tablePrefix>load_runs`, with writes, verifications, efficiency and error
 * kept in JSON columns.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeReportStore implements ReportStore {
  private readonly LoadRun: LoadRunModel;

  constructor(sequelize: Sequelize, options?: SequelizeReportStoreOptions) {
    this.LoadRun = defineLoadRunModel(sequelize, options?.tablePrefix ?? 'loadcheck_');
  }

  async initialize(): Promise<void> {
    await this.LoadRun.sync();
  }

  async saveReport(report: LoadReport): Promise<void> {
    await this.LoadRun.upsert(ReportMapper.toRow(report));
  }

  async getReport(runId: string): Promise<LoadReport | null> {
    const row = await this.LoadRun.findByPk(runId);
    if (!row) return null;
    const plain: LoadRunRow = row.get({ plain: true });
    return ReportMapper.toDomain(plain);
  }

  async listReports(): Promise<readonly LoadReport[]> {
    const rows = await this.LoadRun.findAll({
      order: [
        ['startedAt', 'ASC'],
        ['completedAt', 'ASC'],
      ],
    });
    return rows.map((row) => {
      const plain: LoadRunRow = row.get({ plain: true });
      return ReportMapper.toDomain(plain);
    });
  }
}
