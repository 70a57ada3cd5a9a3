/**
 * Structured issue report: every non-fatal problem of a run, grouped and counted.
 */

import type { AggregationReport } from '../aggregate/types.js';
import type { SourceUnreadableError } from '../errors.js';
import type { ReconciliationIssue } from '../reconcile/types.js';
import { writeFileAtomic } from '../utils/fs.js';
import type { ValidationIssue } from '../validation/types.js';

export interface IssueReportInput {
  runId?: string | null;
  validation?: readonly ValidationIssue[];
  reconciliation?: readonly ReconciliationIssue[];
  unreadable?: readonly SourceUnreadableError[];
  aggregation?: AggregationReport | null;
}

export interface IssueReport {
  readonly runId: string | null;
  readonly generatedAt: string;
  /** Issue kind → number of issues, across validation and reconciliation. */
  readonly counts: Readonly<Record<string, number>>;
  readonly validation: readonly ValidationIssue[];
  readonly reconciliation: readonly ReconciliationIssue[];
  readonly unreadableSources: readonly { path: string; reason: string }[];
  readonly aggregation: AggregationReport | null;
}

export function buildIssueReport(input: IssueReportInput): IssueReport {
  const validation = [...(input.validation ?? [])];
  const reconciliation = [...(input.reconciliation ?? [])];
  const counts: Record<string, number> = {};
  for (const issue of [...validation, ...reconciliation]) {
    counts[issue.kind] = (counts[issue.kind] ?? 0) + 1;
  }

  return {
    runId: input.runId ?? null,
    generatedAt: new Date().toISOString(),
    counts,
    validation,
    reconciliation,
    unreadableSources: (input.unreadable ?? []).map((e) => ({ path: e.path, reason: e.reason })),
    aggregation: input.aggregation ?? null,
  };
}

export async function writeIssueReport(path: string, report: IssueReport): Promise<void> {
  await writeFileAtomic(path, JSON.stringify(report, null, 2) + '\n');
}
