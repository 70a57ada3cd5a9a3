export {
  globToRegExp,
  matchGlob,
  matchExclusion,
  isExcluded,
  normalizeRelativePath,
} from './pattern.js';
export { compileDateFormat, parseDate, formatDateValue, DateFormatSyntaxError } from './dates.js';
export type { CompiledDateFormat } from './dates.js';
export { isLockFile, writeFileAtomic, copyFileAtomic } from './fs.js';
export { DEFAULT_EXPERIMENT_ID_PATTERN, compileExperimentPattern, experimentIdFromPath } from './experiment.js';
