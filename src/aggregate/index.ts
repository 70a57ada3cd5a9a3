export { Aggregator } from './aggregator.js';
export { aggregateExperiments } from './batch.js';
export type { BatchOptions, BatchReport, ExperimentAggregation } from './batch.js';
export { AMBIGUITY_POLICIES, isAmbiguityPolicy } from './types.js';
export type {
  AggregateOptions,
  AggregationCounts,
  AggregationReport,
  AmbiguityPolicy,
  FileCopy,
  FileOutcome,
  TargetReport,
  TargetState,
} from './types.js';
