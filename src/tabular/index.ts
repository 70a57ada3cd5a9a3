export { TabularLoader, formatOf } from './loader.js';
export { formatLocation } from './types.js';
export type { InjectedMismatch, RawRow, RawValue, SourceLocation, LoadOptions, TabularFormat } from './types.js';
