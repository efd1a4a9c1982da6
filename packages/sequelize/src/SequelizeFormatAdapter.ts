import { QueryTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { ColumnType, DestinationLock, LoadError, createDataset, formatCell, schemaOf } from '@loadcheck/core';
import type { Dataset, FormatAdapter, TypeCoercions } from '@loadcheck/core';
import { ROW_INDEX, defineCopyTable } from './models/CopyTableModel.js';
import type { CopyTableModel } from './models/CopyTableModel.js';
import { columnTypeOf, fromSqlValue, toSqlValue } from './SqlColumnTypes.js';

export interface SequelizeFormatAdapterOptions {
  /** Format name the adapter registers under. Default: `'sequelize'`. */
  readonly name?: string;
  /** Rows per `INSERT`. Default: `500`. */
  readonly batchSize?: number;
}

/**
 * Row-oriented relational representation: one table per destination, on any
 * dialect Sequelize v6 supports.
 *
 * Each table carries a hidden `__row_index` primary key so rows are read back
 * in the order they were written. A write drops and recreates the table, then
 * inserts every row in batches inside one transaction.
 *
 * The size of a copy comes from the database itself:
 * - SQLite: used pages (`page_count - freelist_count`) after the write, minus
 *   used pages before it. Writes through one adapter are serialised so the
 *   difference belongs to a single table.
 * - PostgreSQL: `pg_total_relation_size`.
 * - MySQL/MariaDB: `data_length + index_length` from `information_schema`.
 * - Anything else: byte length of every cell rendered as text.
 */
export class SequelizeFormatAdapter implements FormatAdapter {
  readonly name: string;
  readonly declaredCoercions: TypeCoercions;
  private readonly sequelize: Sequelize;
  private readonly batchSize: number;
  private readonly lock = new DestinationLock();

  constructor(sequelize: Sequelize, options?: SequelizeFormatAdapterOptions) {
    this.sequelize = sequelize;
    this.name = options?.name ?? 'sequelize';
    this.batchSize = options?.batchSize ?? 500;
    this.declaredCoercions = sequelize.getDialect() === 'sqlite' ? { [ColumnType.FLOAT32]: ColumnType.FLOAT64 } : {};

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new LoadError('CONFIGURATION_ERROR', `batchSize must be a positive integer, got ${String(this.batchSize)}`, {
        format: this.name,
      });
    }
  }

  write(dataset: Dataset, destination: string): Promise<number> {
    if (dataset.columns.some((column) => column.name === ROW_INDEX)) {
      return Promise.reject(
        new LoadError('INVALID_DATASET', `Column name '${ROW_INDEX}' is reserved`, {
          dataset: dataset.name,
          format: this.name,
          column: ROW_INDEX,
        }),
      );
    }

    return this.lock.run('database', async () => {
      const model = defineCopyTable(this.sequelize, destination, schemaOf(dataset));
      await model.drop();
      const usedBefore = this.isSqlite() ? await this.sqliteUsedBytes() : 0;
      await model.sync();
      await this.insertRows(model, dataset);
      return this.measure(destination, dataset, usedBefore);
    });
  }

  async read(destination: string): Promise<Dataset> {
    const dialect = this.sequelize.getDialect();
    const description = await this.sequelize.getQueryInterface().describeTable(destination);
    if (!(ROW_INDEX in description)) {
      throw new Error(`Table '${destination}' has no '${ROW_INDEX}' column`);
    }

    const schema = Object.entries(description)
      .filter(([name]) => name !== ROW_INDEX)
      .map(([name, column]) => ({ name, type: columnTypeOf(column.type, dialect) }));

    const model = defineCopyTable(this.sequelize, destination, schema);
    const rows = await model.findAll({ order: [[ROW_INDEX, 'ASC']] });
    const records = rows.map((row) => {
      const plain: Record<string, unknown> = row.get({ plain: true });
      return plain;
    });

    return createDataset(
      destination,
      schema.map((column) => ({
        ...column,
        values: records.map((record) => fromSqlValue(record[column.name], column.type)),
      })),
    );
  }

  private async insertRows(model: CopyTableModel, dataset: Dataset): Promise<void> {
    await this.sequelize.transaction(async (transaction) => {
      for (let start = 0; start < dataset.rowCount; start += this.batchSize) {
        const end = Math.min(start + this.batchSize, dataset.rowCount);
        const rows: Record<string, unknown>[] = [];
        for (let index = start; index < end; index++) {
          const row: Record<string, unknown> = { [ROW_INDEX]: index };
          for (const column of dataset.columns) {
            row[column.name] = toSqlValue(column.values[index] ?? null, column.type);
          }
          rows.push(row);
        }
        await model.bulkCreate(rows, { transaction });
      }
    });
  }

  private async measure(destination: string, dataset: Dataset, usedBefore: number): Promise<number> {
    switch (this.sequelize.getDialect()) {
      case 'sqlite':
        return (await this.sqliteUsedBytes()) - usedBefore;
      case 'postgres':
        return this.scalar('SELECT pg_total_relation_size(:table) AS bytes', { table: this.quote(destination) });
      case 'mysql':
      case 'mariadb':
        // InnoDB refreshes table statistics lazily.
        await this.sequelize.query(`ANALYZE TABLE ${this.quote(destination)}`);
        return this.scalar(
          'SELECT data_length + index_length AS bytes FROM information_schema.tables ' +
            'WHERE table_schema = DATABASE() AND table_name = :table',
          { table: destination },
        );
      default:
        return estimateBytes(dataset);
    }
  }

  private quote(table: string): string {
    return this.sequelize.getQueryInterface().quoteIdentifier(table);
  }

  private isSqlite(): boolean {
    return this.sequelize.getDialect() === 'sqlite';
  }

  // An empty database file has no pages; page 1 appears with the first table.
  private sqliteUsedBytes(): Promise<number> {
    return this.scalar(
      'SELECT (max(page_count, 1) - freelist_count) * page_size AS bytes ' +
        'FROM pragma_page_count(), pragma_freelist_count(), pragma_page_size()',
    );
  }

  private async scalar(sql: string, replacements?: Record<string, unknown>): Promise<number> {
    const rows = await this.sequelize.query<{ bytes: unknown }>(sql, { type: QueryTypes.SELECT, replacements });
    const bytes = Number(rows[0]?.bytes);
    if (!Number.isFinite(bytes)) {
      throw new Error(`Could not measure the size of a ${this.name} copy`);
    }
    return bytes;
  }
}

function estimateBytes(dataset: Dataset): number {
  let bytes = 0;
  for (const column of dataset.columns) {
    for (const value of column.values) {
      bytes += Buffer.byteLength(formatCell(value));
    }
  }
  return bytes;
}
