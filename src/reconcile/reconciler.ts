/**
 * IdentifierReconciler: joins validated tables on a shared identifier.
 *
 * Output never depends on the order tables are supplied in. Tables are visited in
 * precedence order (ties broken by kind name), which also decides which value fills an
 * attribute slot when tables disagree.
 */

import type { RunContext } from '../context.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import type { SourceLocation } from '../tabular/types.js';
import { IssueKind } from '../validation/types.js';
import type { TypedValue, ValidatedRecord } from '../validation/types.js';
import type {
  ChildRow,
  ConflictValue,
  ReconcileOptions,
  ReconcileResult,
  ReconcileTable,
  ReconciledRecord,
  ReconciliationIssue,
} from './types.js';

export const DEFAULT_PRECEDENCE: readonly string[] = Object.freeze(['experimental', 'sample', 'sequence']);

/** Text form used to compare values and key identifiers; dates compare by instant. */
export function canonicalText(value: TypedValue): string | null {
  if (value === null) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

interface IndexedTable {
  kind: string;
  table: ReconcileTable;
  rank: number;
  byIdentifier: Map<string, ValidatedRecord[]>;
  attributes: string[];
}

function rankOf(kind: string, table: ReconcileTable, precedence: readonly string[]): number {
  const byKind = precedence.indexOf(kind);
  if (byKind !== -1) return byKind;
  const byCategory = precedence.indexOf(table.category ?? kind);
  return byCategory === -1 ? precedence.length : byCategory;
}

function indexTable(kind: string, table: ReconcileTable, precedence: readonly string[]): IndexedTable {
  const byIdentifier = new Map<string, ValidatedRecord[]>();
  const attributes: string[] = [];
  const seen = new Set<string>();

  for (const record of table.records) {
    for (const attr of Object.keys(record.values)) {
      if (!seen.has(attr)) {
        seen.add(attr);
        attributes.push(attr);
      }
    }
    const key = canonicalText(record.values[table.identifier] ?? null);
    if (key === null) continue;
    const bucket = byIdentifier.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      byIdentifier.set(key, [record]);
    }
  }

  return { kind, table, rank: rankOf(kind, table, precedence), byIdentifier, attributes };
}

function compareTables(a: IndexedTable, b: IndexedTable): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  return a.kind < b.kind ? -1 : a.kind > b.kind ? 1 : 0;
}

function orphanIssue(identifier: string, missing: string[], recordProduced: boolean, locations: SourceLocation[]): ReconciliationIssue {
  return {
    kind: IssueKind.OrphanIdentifier,
    identifier,
    tables: missing,
    attribute: null,
    message: `Identifier '${identifier}' is missing from ${missing.join(', ')}`,
    chosen: null,
    rejected: [],
    recordProduced,
    locations,
  };
}

export class IdentifierReconciler {
  private _precedence: readonly string[];
  private _logger: ContextLogger;

  constructor(context?: RunContext) {
    this._precedence = context?.config.getStringList('reconcile.precedence', DEFAULT_PRECEDENCE) ?? DEFAULT_PRECEDENCE;
    this._logger = context?.logger('reconciler') ?? silentLogger();
  }

  reconcile(tables: Readonly<Record<string, ReconcileTable>>, options?: ReconcileOptions): ReconcileResult {
    const precedence = options?.precedence ?? this._precedence;
    const indexed = Object.entries(tables)
      .map(([kind, table]) => indexTable(kind, table, precedence))
      .sort(compareTables);

    const flagged = indexed.filter((t) => t.table.primary === true);
    const primary = flagged.length > 0 ? flagged : indexed;
    const primaryKinds = new Set(primary.map((t) => t.kind));

    const identifiers = new Set<string>();
    for (const t of primary) {
      for (const key of t.byIdentifier.keys()) identifiers.add(key);
    }

    const records: ReconciledRecord[] = [];
    const issues: ReconciliationIssue[] = [];

    for (const identifier of identifiers) {
      const record = this._merge(identifier, indexed);
      records.push(record);
      issues.push(...record.issues);
    }

    // Identifiers only known to secondary tables: reported, but no record is produced.
    const secondaryOnly = new Set<string>();
    for (const t of indexed) {
      if (primaryKinds.has(t.kind)) continue;
      for (const key of t.byIdentifier.keys()) {
        if (!identifiers.has(key)) secondaryOnly.add(key);
      }
    }
    for (const identifier of secondaryOnly) {
      const locations = indexed.flatMap((t) => (t.byIdentifier.get(identifier) ?? []).map((r) => r.location));
      const missing = indexed.filter((t) => !t.byIdentifier.has(identifier)).map((t) => t.kind);
      issues.push(orphanIssue(identifier, missing, false, locations));
    }

    this._logger.info('Reconciled tables', {
      tables: indexed.map((t) => t.kind),
      records: records.length,
      issues: issues.length,
    });
    return { records, issues };
  }

  private _merge(identifier: string, tables: readonly IndexedTable[]): ReconciledRecord {
    const issues: ReconciliationIssue[] = [];
    const presentIn = new Set<string>();
    const contributions = new Map<string, ConflictValue[]>();
    const attributes: Record<string, TypedValue> = {};
    const children: Record<string, ChildRow[]> = {};
    const locations: SourceLocation[] = [];

    for (const t of tables) {
      const rows = t.byIdentifier.get(identifier) ?? [];
      if (rows.length > 0) presentIn.add(t.kind);
      locations.push(...rows.map((r) => r.location));

      if (t.table.cardinality === 'many') {
        children[t.kind] = rows.map((r) => ({ ...r.values }));
        continue;
      }

      for (const attr of t.attributes) {
        if (!(attr in attributes)) attributes[attr] = null;
      }
      const [first, ...duplicates] = rows;
      if (first === undefined) continue;
      if (duplicates.length > 0) {
        issues.push({
          kind: IssueKind.DuplicateIdentifier,
          identifier,
          tables: [t.kind],
          attribute: null,
          message: `Identifier '${identifier}' appears ${rows.length} times in ${t.kind}; the first row is used`,
          chosen: null,
          rejected: [],
          recordProduced: true,
          locations: rows.map((r) => r.location),
        });
      }
      for (const [attr, value] of Object.entries(first.values)) {
        if (value === null) continue;
        const list = contributions.get(attr);
        const entry = { tableKind: t.kind, value };
        if (list) list.push(entry);
        else contributions.set(attr, [entry]);
      }
    }

    const conflicts: Record<string, ConflictValue[]> = {};
    for (const [attr, values] of contributions) {
      const [chosen] = values;
      if (chosen === undefined) continue;
      attributes[attr] = chosen.value;
      const chosenText = canonicalText(chosen.value);
      const rejected = values.filter((v) => canonicalText(v.value) !== chosenText);
      if (rejected.length === 0) continue;
      conflicts[attr] = values;
      issues.push({
        kind: IssueKind.Conflict,
        identifier,
        tables: values.map((v) => v.tableKind),
        attribute: attr,
        message:
          `Tables disagree on ${attr} for '${identifier}': kept ${chosenText} from ${chosen.tableKind}, ` +
          `rejected ${rejected.map((v) => `${canonicalText(v.value)} from ${v.tableKind}`).join(', ')}`,
        chosen,
        rejected,
        recordProduced: true,
        locations: [],
      });
    }

    const missing = tables.filter((t) => !presentIn.has(t.kind)).map((t) => t.kind);
    if (missing.length > 0) {
      issues.unshift(orphanIssue(identifier, missing, true, locations));
    }

    return { identifier, attributes, children, presentIn, conflicts, issues };
  }
}
