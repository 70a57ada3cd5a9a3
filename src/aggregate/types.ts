import type { ResolutionStatus } from '../targets/types.js';

/**
 * Terminal state of one target. `skipped` means nothing had to be copied.
 */
export type TargetState = 'copied' | 'skipped' | 'failed' | 'not-found';

export type FileOutcome = 'copied' | 'already-present' | 'failed';

export type AmbiguityPolicy = 'fail' | 'newest';

export const AMBIGUITY_POLICIES: readonly AmbiguityPolicy[] = Object.freeze(['fail', 'newest']);

export function isAmbiguityPolicy(value: string): value is AmbiguityPolicy {
  return (AMBIGUITY_POLICIES as readonly string[]).includes(value);
}

export interface FileCopy {
  readonly source: string;
  readonly destination: string;
  readonly outcome: FileOutcome;
  readonly error: string | null;
}

export interface TargetReport {
  readonly key: string;
  readonly name: string;
  readonly state: TargetState;
  readonly resolution: ResolutionStatus;
  readonly matches: readonly string[];
  /** Path the copy started from, after any ambiguity policy was applied. */
  readonly anchor: string | null;
  readonly destination: string;
  readonly files: readonly FileCopy[];
  readonly error: string | null;
  readonly subfolders: readonly TargetReport[];
}

export interface AggregationCounts {
  copied: number;
  alreadyPresent: number;
  failed: number;
}

export interface AggregationReport {
  readonly destinationRoot: string;
  readonly targets: readonly TargetReport[];
  readonly counts: AggregationCounts;
}

export interface AggregateOptions {
  onAmbiguous?: AmbiguityPolicy;
}
