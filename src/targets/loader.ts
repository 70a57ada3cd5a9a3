/**
 * Target descriptor loading: a YAML mapping of `key -> { name, expected_path, recursive,
 * exclusions, subfolders }`, checked with TypeBox and frozen into TargetDescriptors.
 */

import { readFileSync } from 'node:fs';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { TargetDescriptorError, errorMessage } from '../errors.js';
import type { TargetDescriptor } from './types.js';

const ExpectedPathSchema = Type.Object({
  type: Type.Union([Type.Literal('file'), Type.Literal('folder')]),
  pattern: Type.String({ minLength: 1 }),
  anchor: Type.Optional(Type.Union([Type.Literal('self'), Type.Literal('parent')])),
});

export const TargetEntrySchema = Type.Object(
  {
    name: Type.Optional(Type.String({ minLength: 1 })),
    expected_path: Type.Optional(ExpectedPathSchema),
    recursive: Type.Optional(Type.Boolean()),
    exclusions: Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
    subfolders: Type.Optional(Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()])),
  },
  { additionalProperties: true },
);

export type TargetEntry = Static<typeof TargetEntrySchema>;

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildDescriptor(key: string, raw: unknown, path: string, nested: boolean, source: string | null): TargetDescriptor {
  if (!Value.Check(TargetEntrySchema, raw)) {
    const reasons = [...Value.Errors(TargetEntrySchema, raw)].map((e) => `${e.path || '/'}: ${e.message}`);
    throw new TargetDescriptorError(`Target '${path}' is malformed: ${reasons.join('; ')}`, source);
  }

  const name = raw.name ?? key;
  let expected = raw.expected_path;
  if (expected === undefined) {
    if (!nested) {
      throw new TargetDescriptorError(`Target '${path}' has no expected_path`, source);
    }
    // A subfolder without its own pattern is the direct child folder of that name.
    expected = { type: 'folder', pattern: name };
  }

  const subfolders = Object.entries(raw.subfolders ?? {}).map(([subKey, subRaw]) =>
    buildDescriptor(subKey, subRaw, `${path}.${subKey}`, true, source),
  );

  return Object.freeze({
    key,
    name,
    expectedPath: Object.freeze({ type: expected.type, pattern: expected.pattern, anchor: expected.anchor ?? 'self' }),
    recursive: raw.recursive ?? false,
    exclusions: Object.freeze([...(raw.exclusions ?? [])]),
    subfolders: Object.freeze(subfolders),
  });
}

/**
 * Turn already-parsed descriptor data into TargetDescriptors, in declaration order.
 */
export function parseTargetDescriptors(data: unknown, source: string | null = null): TargetDescriptor[] {
  if (!isMapping(data)) {
    throw new TargetDescriptorError('Target descriptor file must be a mapping of target keys', source);
  }
  const descriptors = Object.entries(data).map(([key, raw]) => buildDescriptor(key, raw, key, false, source));
  const names = new Map<string, string>();
  for (const d of descriptors) {
    const owner = names.get(d.name);
    if (owner !== undefined) {
      throw new TargetDescriptorError(`Targets '${owner}' and '${d.key}' share destination name '${d.name}'`, source);
    }
    names.set(d.name, d.key);
  }
  return descriptors;
}

export function loadTargetDescriptors(path: string): TargetDescriptor[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new TargetDescriptorError(`Cannot read target descriptor file: ${errorMessage(e)}`, path);
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (e) {
    throw new TargetDescriptorError(`Invalid YAML in target descriptor file: ${errorMessage(e)}`, path);
  }
  return parseTargetDescriptors(data, path);
}
