/**
 * TargetResolver: binds target descriptors to concrete paths under a search root.
 *
 * Resolution never picks between several matches. More than one match is reported as
 * `ambiguous` with every candidate; choosing one is the caller's policy (see `bind`).
 */

import { dirname, resolve } from 'node:path';
import type { RunContext } from '../context.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { matchGlob } from '../utils/pattern.js';
import type { ResolvedTarget, TargetDescriptor } from './types.js';
import { walkTree } from './walk.js';
import type { TreeEntry } from './walk.js';

export const DEFAULT_MAX_DEPTH = 16;

function notFound(descriptor: TargetDescriptor, root: string): ResolvedTarget {
  return {
    descriptor,
    root,
    matches: [],
    status: 'not-found',
    anchor: null,
    subfolders: descriptor.subfolders.map((sub) => notFound(sub, root)),
  };
}

export class TargetResolver {
  private _maxDepth: number;
  private _logger: ContextLogger;

  constructor(context?: RunContext) {
    this._maxDepth = context?.config.getNumber('targets.max_depth', DEFAULT_MAX_DEPTH) ?? DEFAULT_MAX_DEPTH;
    this._logger = context?.logger('targets') ?? silentLogger();
  }

  resolve(root: string, descriptor: TargetDescriptor): ResolvedTarget {
    const rootResolved = resolve(root);
    return this._resolve(rootResolved, descriptor, walkTree(rootResolved, this._maxDepth, this._logger));
  }

  /** Resolve several descriptors against one root, walking the tree once. */
  resolveAll(root: string, descriptors: readonly TargetDescriptor[]): ResolvedTarget[] {
    const rootResolved = resolve(root);
    const entries = walkTree(rootResolved, this._maxDepth, this._logger);
    return descriptors.map((d) => this._resolve(rootResolved, d, entries));
  }

  /**
   * Bind a target to one chosen path, e.g. one candidate of an ambiguous resolution,
   * and resolve its subfolders below that path.
   */
  bind(resolved: ResolvedTarget, matchPath: string): ResolvedTarget {
    return this._found(resolved.root, resolved.descriptor, resolve(matchPath));
  }

  private _resolve(root: string, descriptor: TargetDescriptor, entries: readonly TreeEntry[]): ResolvedTarget {
    const { type, pattern } = descriptor.expectedPath;
    const wantDirectory = type === 'folder';
    const matches = entries
      .filter((e) => e.isDirectory === wantDirectory && matchGlob(pattern, e.relative))
      .map((e) => e.path)
      .sort();

    const [only] = matches;
    if (matches.length === 1 && only !== undefined) {
      return this._found(root, descriptor, only);
    }

    if (matches.length === 0) {
      this._logger.info('Target not found', { target: descriptor.key, pattern, root });
      return notFound(descriptor, root);
    }

    this._logger.warn('Target is ambiguous', { target: descriptor.key, pattern, matches });
    return {
      descriptor,
      root,
      matches,
      status: 'ambiguous',
      anchor: null,
      subfolders: descriptor.subfolders.map((sub) => notFound(sub, root)),
    };
  }

  private _found(root: string, descriptor: TargetDescriptor, match: string): ResolvedTarget {
    const isFolder = descriptor.expectedPath.type === 'folder';
    const anchor = descriptor.expectedPath.anchor === 'parent' ? dirname(match) : match;
    // Subfolders live below the matched folder, or beside the matched file.
    const subRoot = isFolder ? match : dirname(match);

    let subfolders: ResolvedTarget[] = [];
    if (descriptor.subfolders.length > 0) {
      const entries = walkTree(subRoot, this._maxDepth, this._logger);
      subfolders = descriptor.subfolders.map((sub) => this._resolve(subRoot, sub, entries));
    }

    this._logger.debug('Target found', { target: descriptor.key, match, anchor });
    return { descriptor, root, matches: [match], status: 'found', anchor, subfolders };
  }
}
