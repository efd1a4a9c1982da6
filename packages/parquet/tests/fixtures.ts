import { createDataset } from '@loadcheck/core';
import type { CellValue, Dataset } from '@loadcheck/core';

/** Deterministic five-column dataset with repetitive values. */
export function orders(name: string, rows: number): Dataset {
  const ids: CellValue[] = [];
  const regions: CellValue[] = [];
  const quantities: CellValue[] = [];
  const prices: CellValue[] = [];
  const placedAt: CellValue[] = [];
  const regionPool = ['north', 'south', 'east', 'west'];
  const base = Date.UTC(2024, 2, 1);

  for (let i = 0; i < rows; i++) {
    ids.push(i + 1);
    regions.push(regionPool[i % regionPool.length] ?? 'north');
    quantities.push((i % 20) + 1);
    prices.push(((i % 40) + 1) * 2.5);
    placedAt.push(new Date(base + (i % 48) * 1_800_000));
  }

  return createDataset(name, [
    { name: 'order_id', type: 'int64', values: ids },
    { name: 'region', type: 'text', values: regions },
    { name: 'quantity', type: 'int32', values: quantities },
    { name: 'price', type: 'float64', values: prices },
    { name: 'placed_at', type: 'datetime', values: placedAt },
  ]);
}
