import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDataset } from '@loadcheck/core';
import { SequelizeFormatAdapter } from '../../src/SequelizeFormatAdapter.js';
import { events, mixedDataset, openSqlite } from '../fixtures.js';
import type { SqliteDatabase } from '../fixtures.js';

describe('SequelizeFormatAdapter on SQLite', () => {
  let db: SqliteDatabase;
  let adapter: SequelizeFormatAdapter;

  beforeEach(async () => {
    db = await openSqlite();
    adapter = new SequelizeFormatAdapter(db.sequelize);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should register as sequelize and declare float32 stored as float64', () => {
    expect(adapter.name).toBe('sequelize');
    expect(adapter.declaredCoercions).toEqual({ float32: 'float64' });
  });

  it('should read back the columns, types and values it wrote', async () => {
    const dataset = mixedDataset();

    await adapter.write(dataset, 'mixed_copy');
    const copy = await adapter.read('mixed_copy');

    expect(copy.name).toBe('mixed_copy');
    expect(copy.rowCount).toBe(3);
    expect(copy.columns).toEqual(dataset.columns);
  });

  it('should keep row order across insert batches', async () => {
    const small = new SequelizeFormatAdapter(db.sequelize, { batchSize: 2 });
    const dataset = createDataset('ordered', [{ name: 'value', type: 'int32', values: [5, 3, 9, 1, 7] }]);

    await small.write(dataset, 'ordered');
    const copy = await small.read('ordered');

    expect(copy.columns[0]?.values).toEqual([5, 3, 9, 1, 7]);
  });

  it('should read a float32 column back as float64', async () => {
    const dataset = createDataset('floats', [{ name: 'ratio', type: 'float32', values: [0.5, 0.25] }]);

    await adapter.write(dataset, 'floats');
    const copy = await adapter.read('floats');

    expect(copy.columns).toEqual([{ name: 'ratio', type: 'float64', values: [0.5, 0.25] }]);
  });

  it('should replace an earlier copy at the same destination', async () => {
    await adapter.write(events('first', 20), 'events');
    await adapter.write(events('second', 4), 'events');

    const copy = await adapter.read('events');
    expect(copy.rowCount).toBe(4);
  });

  it('should report a positive size that grows with the number of rows', async () => {
    const small = await adapter.write(events('small', 10), 'small_events');
    const large = await adapter.write(events('large', 2000), 'large_events');

    expect(small).toBeGreaterThan(0);
    expect(large).toBeGreaterThan(small);
  });

  it('should measure the same size when a table is rewritten', async () => {
    const first = await adapter.write(events('run', 500), 'events');
    const second = await adapter.write(events('run', 500), 'events');

    expect(second).toBe(first);
  });

  it('should write and read an empty dataset', async () => {
    const empty = createDataset('empty', [{ name: 'label', type: 'text', values: [] }]);

    const size = await adapter.write(empty, 'empty');
    const copy = await adapter.read('empty');

    expect(size).toBeGreaterThan(0);
    expect(copy.rowCount).toBe(0);
    expect(copy.columns).toEqual([{ name: 'label', type: 'text', values: [] }]);
  });

  it('should serialise concurrent writes', async () => {
    const [a, b] = await Promise.all([
      adapter.write(events('a', 300), 'events_a'),
      adapter.write(events('b', 300), 'events_b'),
    ]);

    expect(a).toBe(b);
    expect((await adapter.read('events_a')).rowCount).toBe(300);
    expect((await adapter.read('events_b')).rowCount).toBe(300);
  });

  it('should reject a dataset using the reserved row index column', async () => {
    const dataset = createDataset('reserved', [{ name: '__row_index', type: 'int32', values: [1] }]);

    await expect(adapter.write(dataset, 'reserved')).rejects.toMatchObject({
      kind: 'INVALID_DATASET',
      message: "Column name '__row_index' is reserved",
    });
  });

  it('should reject reading a table it did not write', async () => {
    await db.sequelize.query('CREATE TABLE foreign_rows (label TEXT)');

    await expect(adapter.read('foreign_rows')).rejects.toThrow("Table 'foreign_rows' has no '__row_index' column");
  });

  it('should reject reading a table that does not exist', async () => {
    await expect(adapter.read('missing_table')).rejects.toThrow();
  });

  it('should reject a batch size below one', () => {
    expect(() => new SequelizeFormatAdapter(db.sequelize, { batchSize: 0 })).toThrow(
      'batchSize must be a positive integer, got 0',
    );
  });
});
