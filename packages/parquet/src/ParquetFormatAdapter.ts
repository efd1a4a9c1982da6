import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { parquetMetadataAsync, parquetReadObjects } from 'hyparquet';
import type { AsyncBuffer } from 'hyparquet';
import { parquetWriteBuffer } from 'hyparquet-writer';
import { createDataset, schemaOf } from '@loadcheck/core';
import type { Dataset, FormatAdapter } from '@loadcheck/core';
import { columnTypeOf, fromParquetValue, parquetSchema, toParquetValues } from './ParquetSchema.js';

/** Compression codecs the adapter can write without extra compressors. */
export type ParquetCodec = 'SNAPPY' | 'UNCOMPRESSED';

export interface ParquetFormatAdapterOptions {
  /** Format name the adapter registers under. Default: `'parquet'`. */
  readonly name?: string;
  /** Default: `'SNAPPY'`. */
  readonly codec?: ParquetCodec;
  /** Rows per row group. Default: `100000`. */
  readonly rowGroupSize?: number;
}

/**
 * Wrap file contents for hyparquet, which reads through an object with
 * `byteLength` and a `slice` method.
 */
function toAsyncBuffer(data: Uint8Array): AsyncBuffer {
  const arrayBuffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(arrayBuffer).set(data);
  return {
    byteLength: arrayBuffer.byteLength,
    slice: (start: number, end?: number) => arrayBuffer.slice(start, end),
  };
}

/**
 * Columnar, compressed representation: one Parquet file per destination,
 * written with hyparquet-writer and read back with hyparquet.
 *
 * Every dataset column type maps onto a Parquet type (text → UTF8 byte array,
 * int32 → INT32, int64 → INT64, float32 → FLOAT, float64 → DOUBLE,
 * datetime → INT64 TIMESTAMP_MILLIS), so nothing is coerced.
 */
export class ParquetFormatAdapter implements FormatAdapter {
  readonly name: string;
  private readonly codec: ParquetCodec;
  private readonly rowGroupSize: number;

  constructor(options?: ParquetFormatAdapterOptions) {
    this.name = options?.name ?? 'parquet';
    this.codec = options?.codec ?? 'SNAPPY';
    this.rowGroupSize = options?.rowGroupSize ?? 100_000;
  }

  async write(dataset: Dataset, destination: string): Promise<number> {
    const columnData = dataset.columns.map((column) => ({
      name: column.name,
      data: toParquetValues(column.values, column.type),
    }));

    const buffer = parquetWriteBuffer({
      columnData,
      schema: parquetSchema(schemaOf(dataset)),
      codec: this.codec,
      rowGroupSize: this.rowGroupSize,
      statistics: true,
    });

    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, new Uint8Array(buffer));
    return (await stat(destination)).size;
  }

  async read(destination: string): Promise<Dataset> {
    const file = toAsyncBuffer(await readFile(destination));
    const metadata = await parquetMetadataAsync(file);
    // schema[0] is the root; the leaves follow in column order.
    const leaves = metadata.schema.slice(1);
    const rows = await parquetReadObjects({ file, metadata });

    return createDataset(
      destination,
      leaves.map((element) => ({
        name: element.name,
        type: columnTypeOf(element),
        values: rows.map((row) => fromParquetValue(row[element.name])),
      })),
    );
  }
}
