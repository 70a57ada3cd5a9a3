import { isAbsolute, relative, resolve } from 'node:path';
import type { ContextLogger } from '../observability/context-logger.js';
import { walkTree } from '../targets/walk.js';
import { matchGlob, normalizeRelativePath } from '../utils/pattern.js';

/**
 * Files under `baseDir` matching any of `patterns`, sorted. Absolute patterns are taken
 * relative to `baseDir` when they point inside it.
 */
export function discoverFiles(
  baseDir: string,
  patterns: readonly string[],
  maxDepth: number,
  logger: ContextLogger,
): string[] {
  const root = resolve(baseDir);
  const relativePatterns = patterns.map((p) => (isAbsolute(p) ? normalizeRelativePath(relative(root, p)) : p));
  const found = walkTree(root, maxDepth, logger)
    .filter((e) => !e.isDirectory && relativePatterns.some((p) => matchGlob(p, e.relative)))
    .map((e) => e.path);
  return [...new Set(found)].sort();
}
