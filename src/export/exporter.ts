/**
 * Canonical delimited export of reconciled records.
 *
 * Nested child rows are flattened here and nowhere else: a record with children becomes
 * one line per child row, the parent's attributes repeated on each line.
 */

import { DataType } from '../schema/types.js';
import type { FieldSpec, Schema } from '../schema/types.js';
import type { ReconciledRecord } from '../reconcile/types.js';
import { formatDateValue } from '../utils/dates.js';
import { writeFileAtomic } from '../utils/fs.js';
import type { TypedValue } from '../validation/types.js';

export type HeaderMode = 'field' | 'label' | 'attribute';

export const HEADER_MODES: readonly HeaderMode[] = Object.freeze(['field', 'label', 'attribute']);

export function isHeaderMode(value: string): value is HeaderMode {
  return (HEADER_MODES as readonly string[]).includes(value);
}

export interface ExportOptions {
  /** Schemas of the joined tables; their fields define the columns. */
  schemas: readonly Schema[];
  /** `field` headers can be loaded back with the same schemas. */
  header?: HeaderMode;
  delimiter?: string;
}

export interface ExportColumn {
  readonly attribute: string;
  readonly heading: string;
  readonly spec: FieldSpec;
}

function headingFor(spec: FieldSpec, mode: HeaderMode): string {
  if (mode === 'label') return spec.label;
  if (mode === 'attribute') return spec.attributeName;
  return spec.sourceField;
}

function childKindsOf(records: readonly ReconciledRecord[]): Set<string> {
  const kinds = new Set<string>();
  for (const record of records) {
    for (const kind of Object.keys(record.children)) kinds.add(kind);
  }
  return kinds;
}

/**
 * Parent schema attributes in schema order, then child attributes not already present.
 */
export function exportColumns(records: readonly ReconciledRecord[], options: ExportOptions): ExportColumn[] {
  const mode = options.header ?? 'field';
  const childKinds = childKindsOf(records);
  const ordered = [
    ...options.schemas.filter((s) => !childKinds.has(s.kind)),
    ...options.schemas.filter((s) => childKinds.has(s.kind)),
  ];

  const columns: ExportColumn[] = [];
  const seen = new Set<string>();
  for (const schema of ordered) {
    for (const spec of schema.fields) {
      if (seen.has(spec.attributeName)) continue;
      seen.add(spec.attributeName);
      columns.push({ attribute: spec.attributeName, heading: headingFor(spec, mode), spec });
    }
  }
  return columns;
}

/**
 * One flat attribute map per output line.
 */
export function flattenRecord(record: ReconciledRecord, kindOrder: readonly string[] = []): Record<string, TypedValue>[] {
  const rank = (kind: string): number => {
    const index = kindOrder.indexOf(kind);
    return index === -1 ? kindOrder.length : index;
  };
  const kinds = Object.keys(record.children)
    .filter((kind) => (record.children[kind]?.length ?? 0) > 0)
    .sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));

  if (kinds.length === 0) return [{ ...record.attributes }];

  const lines: Record<string, TypedValue>[] = [];
  for (const kind of kinds) {
    for (const child of record.children[kind] ?? []) {
      const line: Record<string, TypedValue> = { ...record.attributes };
      for (const [attr, value] of Object.entries(child)) {
        if (value !== null || !(attr in line)) line[attr] = value;
      }
      lines.push(line);
    }
  }
  return lines;
}

export function formatCell(value: TypedValue | undefined, spec: FieldSpec): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    return spec.datatype === DataType.Date && spec.compiledDateFormat
      ? formatDateValue(value, spec.compiledDateFormat)
      : value.toISOString();
  }
  return String(value);
}

export function quoteCell(text: string, delimiter: string): string {
  if (text.includes(delimiter) || /["\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function renderLines(records: readonly ReconciledRecord[], options: ExportOptions): string[] {
  const delimiter = options.delimiter ?? ',';
  const columns = exportColumns(records, options);
  const kindOrder = options.schemas.map((s) => s.kind);

  const lines = [columns.map((c) => quoteCell(c.heading, delimiter)).join(delimiter)];
  for (const record of records) {
    for (const flat of flattenRecord(record, kindOrder)) {
      lines.push(columns.map((c) => quoteCell(formatCell(flat[c.attribute], c.spec), delimiter)).join(delimiter));
    }
  }
  return lines;
}

export function toDelimited(records: readonly ReconciledRecord[], options: ExportOptions): string {
  return renderLines(records, options).join('\n') + '\n';
}

export async function exportDelimited(
  records: readonly ReconciledRecord[],
  path: string,
  options: ExportOptions,
): Promise<{ path: string; rows: number }> {
  const lines = renderLines(records, options);
  await writeFileAtomic(path, lines.join('\n') + '\n');
  return { path, rows: lines.length - 1 };
}
