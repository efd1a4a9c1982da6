export { SequelizeFormatAdapter } from './SequelizeFormatAdapter.js';
export type { SequelizeFormatAdapterOptions } from './SequelizeFormatAdapter.js';
export { SequelizeReportStore } from './SequelizeReportStore.js';
export type { SequelizeReportStoreOptions } from './SequelizeReportStore.js';
export { ROW_INDEX } from './models/CopyTableModel.js';
export { attributeTypeOf, columnTypeOf, toSqlValue, fromSqlValue } from './SqlColumnTypes.js';
