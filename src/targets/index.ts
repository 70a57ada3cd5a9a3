export { TargetResolver, DEFAULT_MAX_DEPTH } from './resolver.js';
export { loadTargetDescriptors, parseTargetDescriptors, TargetEntrySchema } from './loader.js';
export type { TargetEntry } from './loader.js';
export { walkTree } from './walk.js';
export type { TreeEntry } from './walk.js';
export type {
  Anchor,
  ExpectedPath,
  PathType,
  ResolutionStatus,
  ResolvedTarget,
  TargetDescriptor,
} from './types.js';
