/**
 * seqrecon - schema-driven metadata reconciliation and artifact aggregation.
 */

// Core
export { RunContext } from './context.js';
export { Config, DEFAULT_CONFIG } from './config.js';
export { runPipeline } from './pipeline.js';
export type { PipelineOptions, PipelineResult, SourceResult } from './pipeline.js';

// Errors
export {
  SeqReconError,
  ConfigNotFoundError,
  ConfigError,
  SchemaError,
  TargetDescriptorError,
  SourceUnreadableError,
  AggregationError,
  ErrorCodes,
  errorMessage,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Schemas
export {
  SchemaRegistry,
  loadSchema,
  readDescriptorFile,
  iniToDescriptor,
  parseIni,
  DataType,
  DATA_TYPES,
  Schema,
} from './schema/index.js';
export type { FieldSpec, LoadSchemaOptions } from './schema/index.js';

// Loading and validation
export { TabularLoader, formatOf, formatLocation } from './tabular/index.js';
export type { InjectedMismatch, LoadOptions, RawRow, RawValue, SourceLocation, TabularFormat } from './tabular/index.js';
export { MetadataValidator, IssueKind } from './validation/index.js';
export type {
  TypedValue,
  ValidateOptions,
  ValidatedRecord,
  ValidationIssue,
  ValidationResult,
} from './validation/index.js';

// Reconciliation
export { IdentifierReconciler, DEFAULT_PRECEDENCE } from './reconcile/index.js';
export type {
  Cardinality,
  ChildRow,
  ConflictValue,
  ReconcileOptions,
  ReconcileResult,
  ReconcileTable,
  ReconciledRecord,
  ReconciliationIssue,
} from './reconcile/index.js';

// Export
export { toDelimited, exportDelimited, exportColumns, HEADER_MODES, buildIssueReport, writeIssueReport } from './export/index.js';
export type { ExportOptions, HeaderMode, IssueReport, IssueReportInput } from './export/index.js';

// Sources
export { loadManifest, parseManifest, discoverFiles, DEFAULT_JOIN_NAME } from './sources/index.js';
export type { Manifest, SourceSpec } from './sources/index.js';

// Targets and aggregation
export { TargetResolver, DEFAULT_MAX_DEPTH, loadTargetDescriptors, parseTargetDescriptors } from './targets/index.js';
export type { ResolvedTarget, ResolutionStatus, TargetDescriptor } from './targets/index.js';
export { Aggregator, aggregateExperiments, AMBIGUITY_POLICIES } from './aggregate/index.js';
export type {
  AggregateOptions,
  AggregationReport,
  AmbiguityPolicy,
  BatchOptions,
  BatchReport,
  TargetReport,
  TargetState,
} from './aggregate/index.js';

// Observability
export { ContextLogger, silentLogger } from './observability/index.js';
export type { ContextLoggerOptions, LogLevel } from './observability/index.js';

// Utils
export { experimentIdFromPath, DEFAULT_EXPERIMENT_ID_PATTERN, matchGlob } from './utils/index.js';

export const VERSION = '0.1.0';
