export { loadManifest, parseManifest, ManifestSchema, SourceEntrySchema, DEFAULT_JOIN_NAME } from './manifest.js';
export type { Manifest, ManifestData, SourceSpec } from './manifest.js';
export { discoverFiles } from './discover.js';
