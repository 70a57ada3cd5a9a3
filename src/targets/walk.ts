/**
 * Directory walker used to match target patterns against a run folder tree.
 */

import { lstatSync, readdirSync } from 'node:fs';
import type { Stats } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';
import type { ContextLogger } from '../observability/context-logger.js';
import { isLockFile } from '../utils/fs.js';

export interface TreeEntry {
  /** Absolute path. */
  readonly path: string;
  /** POSIX-style path relative to the walk root. */
  readonly relative: string;
  readonly isDirectory: boolean;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * List every file and directory below `root`, depth-first in name order. Symbolic links
 * and office lock files are skipped; directories deeper than `maxDepth` are not entered.
 */
export function walkTree(root: string, maxDepth: number, logger: ContextLogger): TreeEntry[] {
  const rootResolved = resolve(root);
  const entries: TreeEntry[] = [];

  function visit(dirPath: string, depth: number): void {
    let names: string[];
    try {
      names = readdirSync(dirPath).sort();
    } catch (e) {
      logger.warn('Cannot read directory', { path: dirPath, error: String(e) });
      return;
    }

    for (const name of names) {
      if (isLockFile(name)) continue;
      const entryPath = join(dirPath, name);
      let stat: Stats;
      try {
        stat = lstatSync(entryPath);
      } catch (e) {
        logger.warn('Cannot stat entry', { path: entryPath, error: String(e) });
        continue;
      }
      if (stat.isSymbolicLink()) continue;

      const rel = toPosix(relative(rootResolved, entryPath));
      if (stat.isDirectory()) {
        entries.push({ path: entryPath, relative: rel, isDirectory: true });
        if (depth < maxDepth) {
          visit(entryPath, depth + 1);
        } else {
          logger.debug('Max depth reached', { path: entryPath, maxDepth });
        }
      } else if (stat.isFile()) {
        entries.push({ path: entryPath, relative: rel, isDirectory: false });
      }
    }
  }

  visit(rootResolved, 1);
  return entries;
}
