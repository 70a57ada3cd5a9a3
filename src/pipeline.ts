/**
 * Library-level run of a source manifest: load → validate → reconcile → export.
 *
 * Schemas are all loaded before any data is read, so a bad descriptor fails the run
 * up front. Unreadable files are dropped and reported; everything else is collected.
 */

import { join } from 'node:path';
import { RunContext } from './context.js';
import { SourceUnreadableError } from './errors.js';
import { exportDelimited, isHeaderMode } from './export/exporter.js';
import { buildIssueReport, writeIssueReport } from './export/report.js';
import type { IssueReport } from './export/report.js';
import { IdentifierReconciler } from './reconcile/reconciler.js';
import type { ReconcileResult, ReconcileTable } from './reconcile/types.js';
import { SchemaRegistry } from './schema/registry.js';
import { discoverFiles } from './sources/discover.js';
import { loadManifest } from './sources/manifest.js';
import type { Manifest, SourceSpec } from './sources/manifest.js';
import { TabularLoader } from './tabular/loader.js';
import { DEFAULT_MAX_DEPTH } from './targets/resolver.js';
import { DEFAULT_EXPERIMENT_ID_PATTERN, experimentIdFromPath } from './utils/experiment.js';
import { MetadataValidator } from './validation/validator.js';
import type { ValidatedRecord, ValidationIssue } from './validation/types.js';

export interface PipelineOptions {
  /** When set, `<join>.csv` files and `issues.json` are written here. */
  outputDir?: string | null;
  context?: RunContext;
}

export interface SourceResult {
  readonly kind: string;
  readonly files: readonly string[];
  readonly records: readonly ValidatedRecord[];
  readonly issues: readonly ValidationIssue[];
}

export interface PipelineResult {
  readonly runId: string;
  readonly manifest: Manifest;
  readonly schemas: SchemaRegistry;
  readonly sources: Readonly<Record<string, SourceResult>>;
  readonly joins: Readonly<Record<string, ReconcileResult>>;
  readonly unreadable: readonly SourceUnreadableError[];
  readonly report: IssueReport;
  /** Paths written to `outputDir`. */
  readonly outputs: readonly string[];
}

export async function runPipeline(manifestPath: string, options?: PipelineOptions): Promise<PipelineResult> {
  const context = options?.context ?? RunContext.create();
  const logger = context.logger('pipeline');
  const manifest = loadManifest(manifestPath);
  logger.info('Pipeline started', { manifest: manifest.path, sources: manifest.sources.map((s) => s.kind) });

  const schemas = new SchemaRegistry(context.logger('schema'));
  for (const source of manifest.sources) {
    schemas.loadFile(source.kind, source.schemaPath, { identifiers: [source.identifier] });
  }
  schemas.seal();

  const loader = new TabularLoader(context);
  const validator = new MetadataValidator(context);
  const maxDepth = context.config.getNumber('targets.max_depth', DEFAULT_MAX_DEPTH);
  const unreadable: SourceUnreadableError[] = [];
  const sources: Record<string, SourceResult> = {};

  for (const source of manifest.sources) {
    const schema = schemas.get(source.kind);
    const files = discoverFiles(manifest.baseDir, source.files, maxDepth, logger);
    const records: ValidatedRecord[] = [];
    const issues: ValidationIssue[] = [];
    const used: string[] = [];
    const seenExperiments = new Map<string, string>();

    for (const file of files) {
      try {
        const inject = experimentColumn(source, file, seenExperiments);
        const result = await validator.validate(
          loader.load(file, { sheet: source.sheet, delimiter: source.delimiter, inject }),
          schema,
          { identifier: source.identifier },
        );
        records.push(...result.records);
        issues.push(...result.issues);
        used.push(file);
      } catch (e) {
        if (!(e instanceof SourceUnreadableError)) throw e;
        logger.warn('Source dropped', { kind: source.kind, path: e.path, reason: e.reason });
        unreadable.push(e);
      }
    }

    if (files.length === 0) {
      logger.warn('No files matched', { kind: source.kind, patterns: source.files });
    }
    sources[source.kind] = { kind: source.kind, files: used, records, issues };
  }

  const reconciler = new IdentifierReconciler(context);
  const joins: Record<string, ReconcileResult> = {};
  for (const [name, kinds] of Object.entries(manifest.joins)) {
    const tables: Record<string, ReconcileTable> = {};
    for (const kind of kinds) {
      const spec = manifest.sources.find((s) => s.kind === kind);
      const result = sources[kind];
      if (spec === undefined || result === undefined) continue;
      tables[kind] = {
        records: result.records,
        identifier: spec.identifier,
        cardinality: spec.cardinality,
        category: spec.category,
        primary: spec.primary,
      };
    }
    joins[name] = reconciler.reconcile(tables, manifest.precedence ? { precedence: manifest.precedence } : undefined);
  }

  const report = buildIssueReport({
    runId: context.runId,
    validation: Object.values(sources).flatMap((s) => s.issues),
    reconciliation: Object.values(joins).flatMap((j) => j.issues),
    unreadable,
  });

  const outputs: string[] = [];
  const outputDir = options?.outputDir ?? null;
  if (outputDir !== null) {
    const headerSetting = context.config.getString('export.header', 'field');
    const header = isHeaderMode(headerSetting) ? headerSetting : 'field';
    const delimiter = context.config.getString('export.delimiter', ',');
    for (const [name, kinds] of Object.entries(manifest.joins)) {
      const joined = joins[name];
      if (joined === undefined) continue;
      const path = join(outputDir, `${name}.csv`);
      await exportDelimited(joined.records, path, { schemas: kinds.map((k) => schemas.get(k)), header, delimiter });
      outputs.push(path);
    }
    const reportPath = join(outputDir, 'issues.json');
    await writeIssueReport(reportPath, report);
    outputs.push(reportPath);
  }

  logger.info('Pipeline finished', {
    records: Object.fromEntries(Object.entries(joins).map(([n, j]) => [n, j.records.length])),
    issues: report.counts,
    unreadable: unreadable.length,
  });
  return { runId: context.runId, manifest, schemas, sources, joins, unreadable, report, outputs };
}

/**
 * Constant column carrying the experiment ID found in the file's path, if the source
 * declares one. A second file with an already-seen ID is rejected.
 */
function experimentColumn(
  source: SourceSpec,
  file: string,
  seen: Map<string, string>,
): Record<string, string> | undefined {
  if (source.experimentId === null) return undefined;
  const { column, pattern } = source.experimentId;
  const id = experimentIdFromPath(file, pattern ?? DEFAULT_EXPERIMENT_ID_PATTERN);
  if (id === null) {
    throw new SourceUnreadableError(file, 'no experiment ID in path');
  }
  const previous = seen.get(id);
  if (previous !== undefined) {
    throw new SourceUnreadableError(file, `experiment ID ${id} already read from ${previous}`);
  }
  seen.set(id, file);
  return { [column]: id };
}
