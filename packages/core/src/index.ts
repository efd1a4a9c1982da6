// Main entry point
export { LoadEngine } from './LoadEngine.js';
export type { LoadEngineConfig, LoadStatusResult } from './LoadEngine.js';

// Domain model
export { ColumnType } from './domain/model/ColumnType.js';
export type { ColumnCategory } from './domain/model/ColumnType.js';
export { columnCategory, isCompatibleType, isIntegerType, isColumnType } from './domain/model/ColumnType.js';
export type { CellValue, ColumnSchema, Column, Dataset, DatasetRow } from './domain/model/Dataset.js';
export {
  createDataset,
  datasetFromRecords,
  schemaOf,
  columnNames,
  findColumn,
  getRow,
} from './domain/model/Dataset.js';
export type {
  FindingCode,
  FindingSeverity,
  VerificationFinding,
  TypeCheckStatus,
  ColumnTypeCheck,
  Verdict,
  VerificationResult,
  CopyVerification,
} from './domain/model/VerificationResult.js';
export { hasHardFailures, getHardFailures, getSoftFailures, verdictOf } from './domain/model/VerificationResult.js';
export type { RepresentationEfficiency, DatasetEfficiency, EfficiencyRecord } from './domain/model/EfficiencyRecord.js';
export { LoadStatus, canTransition, isTerminal, isLoadStatus } from './domain/model/LoadStatus.js';
export type { LoadInput } from './domain/model/LoadInput.js';
export type { LoadReport, WriteOutcome } from './domain/model/LoadReport.js';
export { isLoadReport } from './domain/model/LoadReport.js';

// Errors
export { LoadError, isLoadError, errorMessage } from './domain/errors/LoadError.js';
export type { LoadErrorKind, LoadErrorContext, LoadErrorInfo } from './domain/errors/LoadError.js';

// Domain services
export { ConsistencyVerifier } from './domain/services/ConsistencyVerifier.js';
export type { ConsistencyVerifierOptions } from './domain/services/ConsistencyVerifier.js';
export { StorageEfficiencyAnalyzer } from './domain/services/StorageEfficiencyAnalyzer.js';
export type { SizeMap } from './domain/services/StorageEfficiencyAnalyzer.js';
export { samplePositions } from './domain/services/RowSampler.js';
export type { VerificationMode } from './domain/services/RowSampler.js';
export { normalizeValue, valuesEqual } from './domain/services/ValueNormalizer.js';
export type { NormalizedValue } from './domain/services/ValueNormalizer.js';
export { inferColumnType, parseCell, formatCell } from './domain/services/TypeInference.js';
export { buildLoadPlan } from './domain/services/LoadPlanBuilder.js';
export type { LoadPlanOptions, DestinationResolver } from './domain/services/LoadPlanBuilder.js';

// Application internals (for extension packages)
export { EventBus } from './application/EventBus.js';
export { DestinationLock } from './application/DestinationLock.js';

// Ports (for custom implementations)
export type { FormatAdapter, TypeCoercions } from './domain/ports/FormatAdapter.js';
export type { ReportStore } from './domain/ports/ReportStore.js';
export type { Logger } from './domain/ports/Logger.js';
export { noopLogger } from './domain/ports/Logger.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LoadStartedEvent,
  CopyWrittenEvent,
  CopyWriteFailedEvent,
  CopyVerifiedEvent,
  CopyReadbackFailedEvent,
  EfficiencyAnalyzedEvent,
  EfficiencyFailedEvent,
  LoadCompletedEvent,
  LoadFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in formats, report stores, loggers)
export { CsvFormatAdapter } from './infrastructure/formats/CsvFormatAdapter.js';
export type { CsvFormatAdapterOptions } from './infrastructure/formats/CsvFormatAdapter.js';
export { InMemoryFormatAdapter } from './infrastructure/formats/InMemoryFormatAdapter.js';
export { InMemoryReportStore } from './infrastructure/reports/InMemoryReportStore.js';
export { FileReportStore } from './infrastructure/reports/FileReportStore.js';
export type { FileReportStoreOptions } from './infrastructure/reports/FileReportStore.js';
export { consoleLogger } from './infrastructure/logging/consoleLogger.js';
