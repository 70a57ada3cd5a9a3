export { IdentifierReconciler, DEFAULT_PRECEDENCE, canonicalText } from './reconciler.js';
export type {
  Cardinality,
  ChildRow,
  ConflictValue,
  ReconcileOptions,
  ReconcileResult,
  ReconcileTable,
  ReconciledRecord,
  ReconciliationIssue,
  ReconciliationIssueKind,
} from './types.js';
