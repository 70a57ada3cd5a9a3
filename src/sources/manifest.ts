/**
 * Source manifest: the declarative catalogue of source kinds a run reads.
 *
 * ```yaml
 * precedence: [experimental, sample, sequence]
 * sources:
 *   sample:
 *     category: sample
 *     schema: schemas/sample.yml
 *     identifier: SAMPLE_ID
 *     cardinality: one
 *     files: ["samples/*.csv"]
 * joins:
 *   samples: [sample, sequence]
 * ```
 */

import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError, errorMessage } from '../errors.js';
import type { Cardinality } from '../reconcile/types.js';

const ExperimentIdSchema = Type.Object({
  column: Type.String({ minLength: 1 }),
  pattern: Type.Optional(Type.String({ minLength: 1 })),
});

export const SourceEntrySchema = Type.Object({
  category: Type.Optional(Type.String({ minLength: 1 })),
  schema: Type.String({ minLength: 1 }),
  identifier: Type.String({ minLength: 1 }),
  cardinality: Type.Optional(Type.Union([Type.Literal('one'), Type.Literal('many')])),
  files: Type.Union([Type.String({ minLength: 1 }), Type.Array(Type.String({ minLength: 1 }), { minItems: 1 })]),
  sheet: Type.Optional(Type.String()),
  delimiter: Type.Optional(Type.String({ minLength: 1 })),
  primary: Type.Optional(Type.Boolean()),
  experiment_id: Type.Optional(ExperimentIdSchema),
});

export const ManifestSchema = Type.Object({
  precedence: Type.Optional(Type.Array(Type.String())),
  sources: Type.Record(Type.String(), SourceEntrySchema),
  joins: Type.Optional(Type.Record(Type.String(), Type.Array(Type.String(), { minItems: 1 }))),
});

export type ManifestData = Static<typeof ManifestSchema>;

export interface SourceSpec {
  readonly kind: string;
  readonly category: string;
  /** Absolute path of the schema descriptor. */
  readonly schemaPath: string;
  readonly identifier: string;
  readonly cardinality: Cardinality;
  /** Glob patterns relative to the manifest directory. */
  readonly files: readonly string[];
  readonly sheet: string | null;
  readonly delimiter: string | null;
  readonly primary: boolean | undefined;
  readonly experimentId: { readonly column: string; readonly pattern: string | null } | null;
}

export interface Manifest {
  readonly path: string | null;
  readonly baseDir: string;
  readonly precedence: readonly string[] | null;
  readonly sources: readonly SourceSpec[];
  /** Join name → source kinds. A single join over every source when the manifest has none. */
  readonly joins: Readonly<Record<string, readonly string[]>>;
}

export const DEFAULT_JOIN_NAME = 'reconciled';

export function parseManifest(data: unknown, baseDir: string, path: string | null = null): Manifest {
  if (!Value.Check(ManifestSchema, data)) {
    const reasons = [...Value.Errors(ManifestSchema, data)].map((e) => `${e.path || '/'}: ${e.message}`);
    throw new ConfigError(`Invalid source manifest${path ? ` ${path}` : ''}: ${reasons.join('; ')}`);
  }

  const sources: SourceSpec[] = Object.entries(data.sources).map(([kind, entry]) => ({
    kind,
    category: entry.category ?? kind,
    schemaPath: resolve(baseDir, entry.schema),
    identifier: entry.identifier,
    cardinality: entry.cardinality ?? 'one',
    files: typeof entry.files === 'string' ? [entry.files] : [...entry.files],
    sheet: entry.sheet ?? null,
    delimiter: entry.delimiter ?? null,
    primary: entry.primary,
    experimentId: entry.experiment_id
      ? { column: entry.experiment_id.column, pattern: entry.experiment_id.pattern ?? null }
      : null,
  }));
  if (sources.length === 0) {
    throw new ConfigError('Source manifest declares no sources');
  }

  const kinds = new Set(sources.map((s) => s.kind));
  const joins = data.joins ?? { [DEFAULT_JOIN_NAME]: sources.map((s) => s.kind) };
  for (const [name, members] of Object.entries(joins)) {
    for (const kind of members) {
      if (!kinds.has(kind)) {
        throw new ConfigError(`Join '${name}' names unknown source '${kind}'`);
      }
    }
  }

  return { path, baseDir, precedence: data.precedence ?? null, sources, joins };
}

export function loadManifest(path: string): Manifest {
  const absolute = resolve(path);
  let content: string;
  try {
    content = readFileSync(absolute, 'utf-8');
  } catch {
    throw new ConfigNotFoundError(absolute);
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in source manifest ${absolute}: ${errorMessage(e)}`);
  }
  return parseManifest(data, dirname(absolute), absolute);
}
