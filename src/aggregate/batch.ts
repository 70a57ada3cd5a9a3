/**
 * Aggregation of every experiment folder directly under a source root.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunContext } from '../context.js';
import { SourceUnreadableError, errorMessage } from '../errors.js';
import { silentLogger } from '../observability/context-logger.js';
import { TargetResolver } from '../targets/resolver.js';
import type { TargetDescriptor } from '../targets/types.js';
import { compileExperimentPattern, experimentIdFromPath } from '../utils/experiment.js';
import { Aggregator } from './aggregator.js';
import type { AggregateOptions, AggregationReport, TargetState } from './types.js';

export interface BatchOptions extends AggregateOptions {
  /** Only folders whose name contains a match are aggregated. Every folder when omitted. */
  experimentPattern?: string | RegExp;
  context?: RunContext;
}

export interface ExperimentAggregation {
  readonly experimentId: string;
  readonly folder: string;
  readonly report: AggregationReport;
}

export interface BatchReport {
  readonly experiments: readonly ExperimentAggregation[];
  /** experiment ID → target key → state */
  readonly summary: Readonly<Record<string, Readonly<Record<string, TargetState>>>>;
}

export async function aggregateExperiments(
  sourceRoot: string,
  destinationRoot: string,
  descriptors: readonly TargetDescriptor[],
  options?: BatchOptions,
): Promise<BatchReport> {
  const logger = options?.context?.logger('batch') ?? silentLogger();
  const resolver = new TargetResolver(options?.context);
  const aggregator = new Aggregator(options?.context);
  const pattern = options?.experimentPattern !== undefined ? compileExperimentPattern(options.experimentPattern) : null;

  let folders: string[];
  try {
    const entries = await readdir(sourceRoot, { withFileTypes: true });
    folders = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  } catch (e) {
    throw new SourceUnreadableError(sourceRoot, errorMessage(e), { cause: e instanceof Error ? e : undefined });
  }

  const experiments: ExperimentAggregation[] = [];
  const summary: Record<string, Record<string, TargetState>> = {};
  for (const folder of folders) {
    const experimentId = pattern === null ? folder : experimentIdFromPath(folder, pattern);
    if (experimentId === null) {
      logger.debug('Folder has no experiment ID, skipping', { folder });
      continue;
    }
    if (experimentId in summary) {
      logger.warn('Experiment ID appears in more than one folder, skipping', { experimentId, folder });
      continue;
    }

    const resolved = resolver.resolveAll(join(sourceRoot, folder), descriptors);
    const report = await aggregator.aggregate(resolved, join(destinationRoot, folder), options);
    experiments.push({ experimentId, folder, report });
    summary[experimentId] = Object.fromEntries(report.targets.map((t) => [t.key, t.state]));
  }

  logger.info('Batch aggregation finished', { experiments: experiments.length });
  return { experiments, summary };
}
