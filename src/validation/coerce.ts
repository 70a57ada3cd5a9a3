/**
 * Raw cell → typed value conversion for each schema datatype.
 */

import { format as formatDate } from 'date-fns';
import { DataType } from '../schema/types.js';
import type { FieldSpec } from '../schema/types.js';
import type { RawValue } from '../tabular/types.js';
import { parseDate } from '../utils/dates.js';
import { IssueKind } from './types.js';
import type { TypedValue } from './types.js';

export type Coercion =
  | { ok: true; value: TypedValue }
  | { ok: false; kind: IssueKind.TypeMismatch | IssueKind.DateFormatMismatch; message: string };

const INT_RE = /^[+-]?\d+(?:\.0*)?$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isBlankCell(value: RawValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function rawToText(value: RawValue): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function mismatch(spec: FieldSpec, raw: RawValue): Coercion {
  return {
    ok: false,
    kind: IssueKind.TypeMismatch,
    message: `${spec.attributeName}: '${rawToText(raw)}' is not a valid ${spec.datatype}`,
  };
}

function coerceInt(spec: FieldSpec, raw: RawValue): Coercion {
  if (typeof raw === 'number') {
    return Number.isInteger(raw) ? { ok: true, value: raw } : mismatch(spec, raw);
  }
  if (typeof raw !== 'string') return mismatch(spec, raw);
  const text = raw.trim();
  if (!INT_RE.test(text)) return mismatch(spec, raw);
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? { ok: true, value } : mismatch(spec, raw);
}

function coerceFloat(spec: FieldSpec, raw: RawValue): Coercion {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? { ok: true, value: raw } : mismatch(spec, raw);
  }
  if (typeof raw !== 'string') return mismatch(spec, raw);
  const text = raw.trim();
  if (!FLOAT_RE.test(text)) return mismatch(spec, raw);
  const value = Number(text);
  return Number.isFinite(value) ? { ok: true, value } : mismatch(spec, raw);
}

function coerceDate(spec: FieldSpec, raw: RawValue): Coercion {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? mismatch(spec, raw) : { ok: true, value: new Date(raw.getTime()) };
  }
  const compiled = spec.compiledDateFormat;
  if (compiled === null || typeof raw === 'boolean' || raw === null) return mismatch(spec, raw);
  const parsed = parseDate(String(raw), compiled);
  if (parsed === null) {
    return {
      ok: false,
      kind: IssueKind.DateFormatMismatch,
      message: `${spec.attributeName}: '${rawToText(raw)}' does not match date format '${compiled.source}'`,
    };
  }
  return { ok: true, value: parsed };
}

function coerceString(raw: RawValue): Coercion {
  if (raw instanceof Date) return { ok: true, value: formatDate(raw, 'yyyy-MM-dd') };
  return { ok: true, value: String(raw).trim() };
}

/**
 * Convert a non-blank raw cell to the field's datatype.
 */
export function coerce(spec: FieldSpec, raw: RawValue): Coercion {
  switch (spec.datatype) {
    case DataType.Str:
      return coerceString(raw);
    case DataType.Int:
      return coerceInt(spec, raw);
    case DataType.Float:
      return coerceFloat(spec, raw);
    case DataType.Date:
      return coerceDate(spec, raw);
  }
}
