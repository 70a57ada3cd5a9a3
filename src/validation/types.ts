/**
 * Validated records and the non-fatal issues raised while producing them.
 */

import type { SourceLocation } from '../tabular/types.js';

export enum IssueKind {
  MissingRequiredField = 'MissingRequiredField',
  TypeMismatch = 'TypeMismatch',
  DateFormatMismatch = 'DateFormatMismatch',
  MissingIdentifier = 'MissingIdentifier',
  MalformedRow = 'MalformedRow',
  InjectedValueMismatch = 'InjectedValueMismatch',
  OrphanIdentifier = 'OrphanIdentifier',
  DuplicateIdentifier = 'DuplicateIdentifier',
  Conflict = 'Conflict',
}

export type TypedValue = string | number | Date | null;

export interface ValidationIssue {
  readonly kind: IssueKind;
  /** Source kind of the schema the row was validated against. */
  readonly table: string;
  readonly attribute: string | null;
  readonly location: SourceLocation;
  readonly message: string;
  /** The offending raw value, as text, when there was one. */
  readonly value: string | null;
}

export interface ValidatedRecord {
  readonly kind: string;
  readonly values: Readonly<Record<string, TypedValue>>;
  readonly location: SourceLocation;
  readonly issues: readonly ValidationIssue[];
  /** False when any required attribute is null. Invalid records are kept, never dropped. */
  readonly valid: boolean;
}

export interface ValidationResult {
  readonly records: ValidatedRecord[];
  readonly issues: ValidationIssue[];
}

export interface ValidateOptions {
  /**
   * Attribute whose null value additionally raises `MissingIdentifier`. Defaults to the
   * schema's first declared identifier; `null` disables the check.
   */
  identifier?: string | null;
}
