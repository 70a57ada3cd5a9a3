/**
 * MetadataValidator: applies a Schema to RawRows, yielding typed, canonically named records.
 *
 * Validation is fail-soft at row granularity: every row yields exactly one record, and a
 * record missing required values is marked invalid and kept with its issues attached.
 */

import type { RunContext } from '../context.js';
import { SchemaError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import type { Schema } from '../schema/types.js';
import type { RawRow } from '../tabular/types.js';
import { coerce, isBlankCell, rawToText } from './coerce.js';
import { IssueKind } from './types.js';
import type {
  TypedValue,
  ValidateOptions,
  ValidatedRecord,
  ValidationIssue,
  ValidationResult,
} from './types.js';

function identifierFor(schema: Schema, options?: ValidateOptions): string | null {
  const identifier = options?.identifier !== undefined ? options.identifier : schema.primaryIdentifier;
  if (identifier !== null && schema.resolve(identifier) === null) {
    throw new SchemaError(`Identifier '${identifier}' is not an attribute of schema '${schema.kind}'`, schema.source);
  }
  return identifier;
}

export class MetadataValidator {
  private _logger: ContextLogger;

  constructor(context?: RunContext) {
    this._logger = context?.logger('validator') ?? silentLogger();
  }

  /**
   * Validate one row. Never throws for bad data; problems are returned on the record.
   */
  validateRow(row: RawRow, schema: Schema, options?: ValidateOptions): ValidatedRecord {
    return this._validateRow(row, schema, identifierFor(schema, options));
  }

  /**
   * Validate a whole table. Accepts the loader's async sequence or any in-memory rows.
   */
  async validate(
    rows: Iterable<RawRow> | AsyncIterable<RawRow>,
    schema: Schema,
    options?: ValidateOptions,
  ): Promise<ValidationResult> {
    const identifier = identifierFor(schema, options);
    const records: ValidatedRecord[] = [];
    const issues: ValidationIssue[] = [];

    for await (const row of rows) {
      const record = this._validateRow(row, schema, identifier);
      records.push(record);
      issues.push(...record.issues);
    }

    this._logger.info('Validated table', {
      kind: schema.kind,
      records: records.length,
      invalid: records.filter((r) => !r.valid).length,
      issues: issues.length,
    });
    return { records, issues };
  }

  private _validateRow(row: RawRow, schema: Schema, identifier: string | null): ValidatedRecord {
    const issues: ValidationIssue[] = [];
    const values: Record<string, TypedValue> = {};
    const issue = (kind: IssueKind, attribute: string | null, message: string, value: string | null): void => {
      issues.push({ kind, table: schema.kind, attribute, location: row.location, message, value });
    };

    if (row.parseIssue !== null) {
      issue(IssueKind.MalformedRow, null, `Malformed row: ${row.parseIssue}`, null);
    }
    for (const { column, injected, found } of row.mismatches) {
      const attribute = schema.resolveSourceField(column)?.attributeName ?? null;
      issue(
        IssueKind.InjectedValueMismatch,
        attribute,
        `Column '${column}' holds '${found}' but the injected value is '${injected}'`,
        found,
      );
    }

    let valid = true;
    for (const spec of schema.fields) {
      const raw = row.cells.get(spec.sourceField);
      if (raw === undefined || isBlankCell(raw)) {
        values[spec.attributeName] = null;
        if (spec.required) {
          valid = false;
          const detail = raw === undefined ? `column '${spec.sourceField}' is absent` : 'value is blank';
          issue(IssueKind.MissingRequiredField, spec.attributeName, `${spec.attributeName}: ${detail}`, null);
        }
        continue;
      }

      const result = coerce(spec, raw);
      if (result.ok) {
        values[spec.attributeName] = result.value;
        continue;
      }
      values[spec.attributeName] = null;
      if (spec.required) valid = false;
      issue(result.kind, spec.attributeName, result.message, rawToText(raw));
    }

    if (identifier !== null && values[identifier] === null) {
      issue(IssueKind.MissingIdentifier, identifier, `Row has no value for identifier ${identifier}`, null);
    }

    if (issues.length > 0) {
      this._logger.debug('Row has issues', {
        kind: schema.kind,
        path: row.location.path,
        row: row.location.row,
        issues: issues.map((i) => i.kind),
      });
    }

    return { kind: schema.kind, values, location: row.location, issues, valid };
  }
}
