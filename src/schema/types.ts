/**
 * Schema type definitions: field specs and the immutable per-source-kind Schema.
 */

import type { CompiledDateFormat } from '../utils/dates.js';

export enum DataType {
  Str = 'str',
  Int = 'int',
  Float = 'float',
  Date = 'date',
}

export const DATA_TYPES: readonly DataType[] = Object.freeze([DataType.Str, DataType.Int, DataType.Float, DataType.Date]);

export function isDataType(value: string): value is DataType {
  return (DATA_TYPES as readonly string[]).includes(value);
}

export interface FieldSpec {
  readonly attributeName: string;
  readonly sourceField: string;
  readonly label: string;
  readonly datatype: DataType;
  /** strftime-style format; set iff `datatype` is `date`. */
  readonly dateFormat: string | null;
  readonly compiledDateFormat: CompiledDateFormat | null;
  readonly required: boolean;
  readonly identifier: boolean;
}

export class Schema {
  readonly kind: string;
  readonly fields: readonly FieldSpec[];
  readonly identifiers: readonly string[];
  readonly source: string | null;
  private readonly _byAttribute: ReadonlyMap<string, FieldSpec>;
  private readonly _bySourceField: ReadonlyMap<string, FieldSpec>;

  constructor(kind: string, fields: readonly FieldSpec[], source: string | null = null) {
    this.kind = kind;
    this.fields = Object.freeze(fields.map((f) => Object.freeze({ ...f })));
    this.identifiers = Object.freeze(this.fields.filter((f) => f.identifier).map((f) => f.attributeName));
    this.source = source;
    this._byAttribute = new Map(this.fields.map((f) => [f.attributeName, f]));
    this._bySourceField = new Map(this.fields.map((f) => [f.sourceField, f]));
    Object.freeze(this);
  }

  get attributeNames(): string[] {
    return this.fields.map((f) => f.attributeName);
  }

  get size(): number {
    return this.fields.length;
  }

  resolve(attributeName: string): FieldSpec | null {
    return this._byAttribute.get(attributeName) ?? null;
  }

  resolveSourceField(sourceField: string): FieldSpec | null {
    return this._bySourceField.get(sourceField) ?? null;
  }

  /** The default join key: first declared identifier, or null when none is declared. */
  get primaryIdentifier(): string | null {
    return this.identifiers[0] ?? null;
  }
}
