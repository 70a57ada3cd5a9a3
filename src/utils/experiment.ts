/**
 * Experiment IDs embedded in folder and file names, e.g. `2024-03-01_SWmy001_run`.
 */

export const DEFAULT_EXPERIMENT_ID_PATTERN = '(SW|PC|SL)[a-zA-Z]{2}[0-9]{3}';

export function compileExperimentPattern(pattern: string | RegExp = DEFAULT_EXPERIMENT_ID_PATTERN): RegExp {
  return typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

/**
 * First experiment ID in `path`. The last path segment is searched before the whole path.
 */
export function experimentIdFromPath(path: string, pattern: string | RegExp = DEFAULT_EXPERIMENT_ID_PATTERN): string | null {
  const regex = compileExperimentPattern(pattern);
  const normalized = path.replace(/\\/g, '/').replace(/\/+$/, '');
  const name = normalized.slice(normalized.lastIndexOf('/') + 1);
  const match = regex.exec(name) ?? regex.exec(normalized);
  return match ? match[0] : null;
}
