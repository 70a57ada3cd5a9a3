/**
 * Target descriptors (declared artifacts of a sequencing run) and their resolution results.
 */

export type PathType = 'file' | 'folder';

/**
 * `self`: copy the matched node. `parent`: copy the directory that contains the match,
 * e.g. the run folder around a summary file.
 */
export type Anchor = 'self' | 'parent';

export interface ExpectedPath {
  readonly type: PathType;
  readonly pattern: string;
  readonly anchor: Anchor;
}

export interface TargetDescriptor {
  /** Key of the entry in the descriptor file. */
  readonly key: string;
  /** Destination folder name. */
  readonly name: string;
  readonly expectedPath: ExpectedPath;
  /** Copy the whole subtree below the anchor, or only its direct child files. */
  readonly recursive: boolean;
  readonly exclusions: readonly string[];
  readonly subfolders: readonly TargetDescriptor[];
}

export type ResolutionStatus = 'found' | 'not-found' | 'ambiguous';

export interface ResolvedTarget {
  readonly descriptor: TargetDescriptor;
  /** Directory the pattern was matched against. */
  readonly root: string;
  /** Absolute paths of every match, sorted. */
  readonly matches: readonly string[];
  readonly status: ResolutionStatus;
  /** Directory or file the copy starts from; set only when `status` is `found`. */
  readonly anchor: string | null;
  readonly subfolders: readonly ResolvedTarget[];
}
