import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Sequelize } from 'sequelize';
import { createDataset } from '@loadcheck/core';
import type { CellValue, Dataset, LoadReport } from '@loadcheck/core';
import { SQLite3Wrapper } from './better-sqlite3-adapter.js';

export interface SqliteDatabase {
  readonly sequelize: Sequelize;
  readonly dir: string;
  close(): Promise<void>;
}

/** Sequelize on a fresh SQLite file under the OS temp directory. */
export async function openSqlite(): Promise<SqliteDatabase> {
  const dir = await mkdtemp(join(tmpdir(), 'loadcheck-sequelize-'));
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage: join(dir, 'load.sqlite'),
    logging: false,
    dialectModule: { Database: SQLite3Wrapper },
  });
  return {
    sequelize,
    dir,
    async close() {
      await sequelize.close();
      await rm(dir, { recursive: true, force: true });
    },
  };
}

/** One column per dataset type, with a null in each. */
export function mixedDataset(name = 'mixed'): Dataset {
  return createDataset(name, [
    { name: 'id', type: 'int64', values: [1, 2, 3] },
    { name: 'name', type: 'text', values: ['Ada', null, 'Linus'] },
    { name: 'quantity', type: 'int32', values: [10, 20, null] },
    { name: 'price', type: 'float64', values: [9.5, null, 0.125] },
    {
      name: 'seen_at',
      type: 'datetime',
      values: [new Date('2024-03-01T10:30:00.123Z'), new Date('2024-03-02T08:00:00.000Z'), null],
    },
  ]);
}

/** Deterministic five-column dataset with repetitive values. */
export function events(name: string, rows: number): Dataset {
  const ids: CellValue[] = [];
  const kinds: CellValue[] = [];
  const counts: CellValue[] = [];
  const weights: CellValue[] = [];
  const occurredAt: CellValue[] = [];
  const kindPool = ['click', 'view', 'scroll'];
  const base = Date.UTC(2024, 5, 1);

  for (let i = 0; i < rows; i++) {
    ids.push(i + 1);
    kinds.push(kindPool[i % kindPool.length] ?? 'click');
    counts.push(i % 30);
    weights.push((i % 16) * 0.5);
    occurredAt.push(new Date(base + (i % 60) * 60_000));
  }

  return createDataset(name, [
    { name: 'event_id', type: 'int64', values: ids },
    { name: 'kind', type: 'text', values: kinds },
    { name: 'count', type: 'int32', values: counts },
    { name: 'weight', type: 'float64', values: weights },
    { name: 'occurred_at', type: 'datetime', values: occurredAt },
  ]);
}

export function sampleReport(runId: string, startedAt: number, overrides: Partial<LoadReport> = {}): LoadReport {
  return {
    runId,
    status: 'COMPLETED',
    startedAt,
    completedAt: startedAt + 120,
    elapsedMs: 120,
    writes: [
      { dataset: 'full', format: 'csv', destination: 'out/full.csv', bytesWritten: 46, error: null },
      { dataset: 'full', format: 'sequelize', destination: 'full', bytesWritten: 4096, error: null },
    ],
    verifications: [
      {
        dataset: 'full',
        format: 'csv',
        destination: 'out/full.csv',
        sourceRecordCount: 3,
        targetRecordCount: 3,
        schemaMatch: true,
        columnOrderMatch: true,
        columnTypes: [{ column: 'quantity', sourceType: 'int32', targetType: 'int64', status: 'coerced' }],
        sampledRows: 3,
        sampleMismatchCount: 0,
        findings: [
          {
            code: 'TYPE_COERCION',
            severity: 'warning',
            dataset: 'full',
            format: 'csv',
            column: 'quantity',
            message: "Column 'quantity' stored as int64 instead of int32",
            metadata: { sourceType: 'int32', targetType: 'int64' },
          },
        ],
        verdict: 'pass',
      },
    ],
    efficiency: {
      baseline: 'csv',
      datasets: [
        {
          dataset: 'full',
          representations: {
            csv: { sizeBytes: 46, ratio: 1 },
            sequelize: { sizeBytes: 4096, ratio: 46 / 4096 },
          },
          error: null,
        },
      ],
    },
    error: null,
    ...overrides,
  };
}
