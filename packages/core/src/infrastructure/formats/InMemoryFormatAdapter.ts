import type { CellValue, Column, Dataset } from '../../domain/model/Dataset.js';
import { createDataset } from '../../domain/model/Dataset.js';
import type { FormatAdapter } from '../../domain/ports/FormatAdapter.js';

function copyValue(value: CellValue): CellValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}

function copyColumns(columns: readonly Column[]): Column[] {
  return columns.map((c) => ({ name: c.name, type: c.type, values: c.values.map(copyValue) }));
}

/**
 * Keeps copies in process memory, keyed by destination. Lossless; reported
 * size is the length of the copy serialised as JSON.
 *
 * Useful in tests and as a reference for adapter authors.
 */
export class InMemoryFormatAdapter implements FormatAdapter {
  readonly name: string;
  private readonly copies = new Map<string, { name: string; columns: Column[] }>();

  constructor(name = 'memory') {
    this.name = name;
  }

  write(dataset: Dataset, destination: string): Promise<number> {
    const columns = copyColumns(dataset.columns);
    this.copies.set(destination, { name: dataset.name, columns });
    return Promise.resolve(Buffer.byteLength(JSON.stringify(columns), 'utf-8'));
  }

  read(destination: string): Promise<Dataset> {
    const copy = this.copies.get(destination);
    if (!copy) {
      return Promise.reject(new Error(`Nothing was written to '${destination}'`));
    }
    return Promise.resolve(createDataset(copy.name, copyColumns(copy.columns)));
  }

  has(destination: string): boolean {
    return this.copies.has(destination);
  }

  clear(): void {
    this.copies.clear();
  }
}
