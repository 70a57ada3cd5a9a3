/**
 * Shape of one schema descriptor entry, checked with TypeBox before a FieldSpec is built.
 *
 * Entries are open objects: keys not listed here are ignored so descriptors can carry
 * notes for other tools.
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

const Scalar = Type.Union([Type.String(), Type.Number()]);

export const FieldEntrySchema = Type.Object(
  {
    field: Scalar,
    label: Type.Optional(Type.Union([Scalar, Type.Null()])),
    datatype: Type.Optional(Type.Union([Type.String(), Type.Null()])),
    dateformat: Type.Optional(Type.Union([Type.String(), Type.Null()])),
    required: Type.Optional(Type.Boolean()),
    identifier: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: true },
);

export type FieldEntry = Static<typeof FieldEntrySchema>;

export function isFieldEntry(value: unknown): value is FieldEntry {
  return Value.Check(FieldEntrySchema, value);
}

/**
 * Human-readable reasons an entry failed the shape check, e.g. `/field: Expected union value`.
 */
export function describeEntryErrors(value: unknown): string[] {
  return [...Value.Errors(FieldEntrySchema, value)].map((error) => `${error.path || '/'}: ${error.message}`);
}
