export { ParquetFormatAdapter } from './ParquetFormatAdapter.js';
export type { ParquetFormatAdapterOptions, ParquetCodec } from './ParquetFormatAdapter.js';
export { columnTypeOf, parquetSchema, toParquetValues, fromParquetValue } from './ParquetSchema.js';
