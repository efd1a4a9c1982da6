import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import Papa from 'papaparse';
import type { Dataset } from '../../domain/model/Dataset.js';
import { createDataset } from '../../domain/model/Dataset.js';
import type { ColumnType } from '../../domain/model/ColumnType.js';
import { isColumnType } from '../../domain/model/ColumnType.js';
import type { FormatAdapter } from '../../domain/ports/FormatAdapter.js';
import { formatCell, inferColumnType, parseCell } from '../../domain/services/TypeInference.js';

export interface CsvFormatAdapterOptions {
  /** Format name the adapter registers under. Default: `'csv'`. */
  readonly name?: string;
  /** Field delimiter. Default: `','`. */
  readonly delimiter?: string;
}

/** Split an `name:type` header cell. Cells without a known type suffix carry no type. */
function parseHeaderCell(cell: string): { name: string; type: ColumnType | null } {
  const at = cell.lastIndexOf(':');
  const suffix = cell.slice(at + 1);
  if (at > 0 && isColumnType(suffix)) {
    return { name: cell.slice(0, at), type: suffix };
  }
  return { name: cell, type: null };
}

/**
 * Delimited-text representation using PapaParse. Uncompressed, so it is the
 * usual baseline for storage efficiency.
 *
 * The header row carries each column's type as `name:type`, so copies read
 * back with the types they were written with. Columns of files written
 * elsewhere, without the suffix, get an inferred type. Empty cells and `null`
 * are the same.
 */
export class CsvFormatAdapter implements FormatAdapter {
  readonly name: string;
  private readonly delimiter: string;

  constructor(options?: CsvFormatAdapterOptions) {
    this.name = options?.name ?? 'csv';
    this.delimiter = options?.delimiter ?? ',';
  }

  async write(dataset: Dataset, destination: string): Promise<number> {
    const rows: string[][] = [];
    for (let i = 0; i < dataset.rowCount; i++) {
      rows.push(dataset.columns.map((c) => formatCell(c.values[i] ?? null)));
    }

    const content = Papa.unparse(
      { fields: dataset.columns.map((c) => `${c.name}:${c.type}`), data: rows },
      {
        delimiter: this.delimiter,
        newline: '\n',
        // A single-column row holding null is then `""`, never a bare empty line.
        quotes: dataset.columns.length === 1,
      },
    );

    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, content, 'utf-8');
    return (await stat(destination)).size;
  }

  async read(destination: string): Promise<Dataset> {
    const content = await readFile(destination, 'utf-8');
    const name = destination;
    if (content === '') return createDataset(name, []);

    // One trailing line break ends the last record; it does not open another.
    const result = Papa.parse<string[]>(content.replace(/\r?\n$/, ''), {
      header: false,
      delimiter: this.delimiter,
      dynamicTyping: false,
    });
    const [firstError] = result.errors;
    if (firstError) {
      throw new Error(`Malformed CSV in ${destination} at row ${String(firstError.row)}: ${firstError.message}`);
    }

    const [header = [], ...rows] = result.data;
    return createDataset(
      name,
      header.map((cell, index) => {
        const declared = parseHeaderCell(cell);
        const raw = rows.map((row) => row[index] ?? null);
        const type = declared.type ?? inferColumnType(raw);
        return { name: declared.name, type, values: raw.map((value) => parseCell(value, type)) };
      }),
    );
  }
}
