/**
 * Reconciliation types: tables joined on a shared identifier into one record per identifier.
 */

import type { SourceLocation } from '../tabular/types.js';
import type { IssueKind, TypedValue, ValidatedRecord } from '../validation/types.js';

export type Cardinality = 'one' | 'many';

export interface ReconcileTable {
  readonly records: readonly ValidatedRecord[];
  /** Attribute holding the join key in this table. */
  readonly identifier: string;
  /** `one`: at most one row per identifier. `many`: rows nest under the reconciled record. */
  readonly cardinality: Cardinality;
  /** Precedence group, e.g. `experimental`, `sample` or `sequence`. Defaults to the table kind. */
  readonly category?: string;
  /** Whether this table's identifiers produce records. When no table is flagged, all are primary. */
  readonly primary?: boolean;
}

export interface ConflictValue {
  readonly tableKind: string;
  readonly value: TypedValue;
}

export type ReconciliationIssueKind = IssueKind.OrphanIdentifier | IssueKind.DuplicateIdentifier | IssueKind.Conflict;

export interface ReconciliationIssue {
  readonly kind: ReconciliationIssueKind;
  readonly identifier: string;
  /** Missing kinds for an orphan, the duplicated kind, or the kinds that disagree on a conflict. */
  readonly tables: readonly string[];
  readonly attribute: string | null;
  readonly message: string;
  readonly chosen: ConflictValue | null;
  readonly rejected: readonly ConflictValue[];
  /** False when the identifier only appeared in non-primary tables and no record was produced. */
  readonly recordProduced: boolean;
  readonly locations: readonly SourceLocation[];
}

export type ChildRow = Readonly<Record<string, TypedValue>>;

export interface ReconciledRecord {
  readonly identifier: string;
  readonly attributes: Readonly<Record<string, TypedValue>>;
  readonly children: Readonly<Record<string, readonly ChildRow[]>>;
  readonly presentIn: ReadonlySet<string>;
  readonly conflicts: Readonly<Record<string, readonly ConflictValue[]>>;
  readonly issues: readonly ReconciliationIssue[];
}

export interface ReconcileOptions {
  /** Highest precedence first; entries name categories or table kinds. */
  precedence?: readonly string[];
}

export interface ReconcileResult {
  readonly records: ReconciledRecord[];
  readonly issues: ReconciliationIssue[];
}
