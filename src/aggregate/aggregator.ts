/**
 * Aggregator: copies resolved targets into `<destination>/<target name>/`.
 *
 * Sources are never modified. Each file is copied through a temp file and a rename, and a
 * destination file with the source's size and modification time is left alone, so an
 * interrupted run can simply be repeated.
 */

import type { Dirent } from 'node:fs';
import { access, constants, mkdir, readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { RunContext } from '../context.js';
import { AggregationError, errorMessage } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { TargetResolver } from '../targets/resolver.js';
import type { ResolvedTarget } from '../targets/types.js';
import { copyFileAtomic, isLockFile } from '../utils/fs.js';
import { isExcluded } from '../utils/pattern.js';
import { isAmbiguityPolicy } from './types.js';
import type {
  AggregateOptions,
  AggregationCounts,
  AggregationReport,
  AmbiguityPolicy,
  FileCopy,
  TargetReport,
  TargetState,
} from './types.js';

interface PlannedFile {
  source: string;
  relative: string;
}

async function isUnchanged(source: string, destination: string): Promise<boolean> {
  try {
    const [src, dst] = await Promise.all([stat(source), stat(destination)]);
    return dst.isFile() && src.size === dst.size && Math.trunc(src.mtimeMs) === Math.trunc(dst.mtimeMs);
  } catch {
    return false;
  }
}

/**
 * Files below `dir` to copy, as paths relative to it. Excluded directories are not entered.
 */
async function planFiles(dir: string, recursive: boolean, exclusions: readonly string[]): Promise<PlannedFile[]> {
  const planned: PlannedFile[] = [];

  async function visit(current: string, prefix: string): Promise<void> {
    const entries: Dirent[] = await readdir(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      if (entry.isSymbolicLink() || isLockFile(entry.name)) continue;
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (recursive && !isExcluded(exclusions, rel, true)) {
          await visit(join(current, entry.name), rel);
        }
      } else if (entry.isFile() && !isExcluded(exclusions, rel, false)) {
        planned.push({ source: join(current, entry.name), relative: rel });
      }
    }
  }

  await visit(dir, '');
  return planned;
}

function countFiles(reports: readonly TargetReport[], counts: AggregationCounts): AggregationCounts {
  for (const report of reports) {
    for (const file of report.files) {
      if (file.outcome === 'copied') counts.copied += 1;
      else if (file.outcome === 'already-present') counts.alreadyPresent += 1;
      else counts.failed += 1;
    }
    countFiles(report.subfolders, counts);
  }
  return counts;
}

export class Aggregator {
  private _onAmbiguous: AmbiguityPolicy;
  private _resolver: TargetResolver;
  private _logger: ContextLogger;

  constructor(context?: RunContext) {
    const policy = context?.config.getString('aggregate.on_ambiguous', 'fail') ?? 'fail';
    this._onAmbiguous = isAmbiguityPolicy(policy) ? policy : 'fail';
    this._resolver = new TargetResolver(context);
    this._logger = context?.logger('aggregator') ?? silentLogger();
  }

  /**
   * Copy every resolved target. Per-target problems are reported on the target; only an
   * unusable destination root throws.
   */
  async aggregate(
    targets: readonly ResolvedTarget[],
    destinationRoot: string,
    options?: AggregateOptions,
  ): Promise<AggregationReport> {
    try {
      await mkdir(destinationRoot, { recursive: true });
      await access(destinationRoot, constants.W_OK);
    } catch (e) {
      throw new AggregationError(destinationRoot, errorMessage(e), { cause: e instanceof Error ? e : undefined });
    }

    const policy = options?.onAmbiguous ?? this._onAmbiguous;
    const reports: TargetReport[] = [];
    for (const target of targets) {
      reports.push(await this._aggregateTarget(target, join(destinationRoot, target.descriptor.name), policy));
    }

    const counts = countFiles(reports, { copied: 0, alreadyPresent: 0, failed: 0 });
    this._logger.info('Aggregation finished', {
      destination: destinationRoot,
      targets: reports.map((r) => `${r.key}:${r.state}`),
      ...counts,
    });
    return { destinationRoot, targets: reports, counts };
  }

  private async _aggregateTarget(
    resolved: ResolvedTarget,
    destination: string,
    policy: AmbiguityPolicy,
  ): Promise<TargetReport> {
    const { descriptor } = resolved;
    const base = {
      key: descriptor.key,
      name: descriptor.name,
      resolution: resolved.status,
      matches: resolved.matches,
      destination,
    };

    if (resolved.status === 'not-found') {
      return { ...base, state: 'not-found', anchor: null, files: [], error: null, subfolders: [] };
    }

    let target = resolved;
    if (resolved.status === 'ambiguous') {
      if (policy === 'fail') {
        const error = `${resolved.matches.length} paths match '${descriptor.expectedPath.pattern}'`;
        this._logger.warn('Ambiguous target not copied', { target: descriptor.key, matches: resolved.matches });
        return { ...base, state: 'failed', anchor: null, files: [], error, subfolders: [] };
      }
      try {
        target = this._resolver.bind(resolved, await newest(resolved.matches));
      } catch (e) {
        return { ...base, state: 'failed', anchor: null, files: [], error: errorMessage(e), subfolders: [] };
      }
      this._logger.info('Ambiguous target bound to newest match', { target: descriptor.key, anchor: target.anchor });
    }

    const anchor = target.anchor;
    const [match] = target.matches;
    if (anchor === null || match === undefined) {
      return { ...base, state: 'not-found', anchor: null, files: [], error: null, subfolders: [] };
    }

    let files: FileCopy[];
    try {
      await mkdir(destination, { recursive: true });
      const planned = descriptor.expectedPath.type === 'file' && descriptor.expectedPath.anchor === 'self'
        ? [{ source: match, relative: basename(match) }]
        : await planFiles(anchor, descriptor.recursive, descriptor.exclusions);
      files = [];
      for (const file of planned) {
        files.push(await this._copyFile(file.source, join(destination, file.relative)));
      }
    } catch (e) {
      const error = new AggregationError(destination, errorMessage(e)).message;
      this._logger.error('Target failed', { target: descriptor.key, error });
      return { ...base, state: 'failed', anchor, files: [], error, subfolders: [] };
    }

    const subfolders: TargetReport[] = [];
    for (const sub of target.subfolders) {
      subfolders.push(await this._aggregateTarget(sub, join(destination, sub.descriptor.name), policy));
    }

    const state = stateOf(files);
    this._logger.info('Target aggregated', { target: descriptor.key, state, files: files.length });
    return { ...base, state, anchor, files, error: null, subfolders };
  }

  private async _copyFile(source: string, destination: string): Promise<FileCopy> {
    if (await isUnchanged(source, destination)) {
      return { source, destination, outcome: 'already-present', error: null };
    }
    try {
      await copyFileAtomic(source, destination);
      this._logger.debug('Copied', { source, destination });
      return { source, destination, outcome: 'copied', error: null };
    } catch (e) {
      this._logger.warn('Copy failed', { source, destination, error: errorMessage(e) });
      return { source, destination, outcome: 'failed', error: errorMessage(e) };
    }
  }
}

function stateOf(files: readonly FileCopy[]): TargetState {
  if (files.some((f) => f.outcome === 'failed')) return 'failed';
  if (files.some((f) => f.outcome === 'copied')) return 'copied';
  return 'skipped';
}

/** The most recently modified path; the first in sorted order on a tie. */
async function newest(paths: readonly string[]): Promise<string> {
  const candidates = await Promise.all(
    [...paths].sort().map(async (path) => ({ path, mtimeMs: (await stat(path)).mtimeMs })),
  );
  const [first, ...rest] = candidates;
  if (first === undefined) {
    throw new Error('no candidate paths');
  }
  return rest.reduce((best, c) => (c.mtimeMs > best.mtimeMs ? c : best), first).path;
}
