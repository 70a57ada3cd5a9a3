export { DataType, DATA_TYPES, isDataType, Schema } from './types.js';
export type { FieldSpec } from './types.js';
export { FieldEntrySchema, isFieldEntry, describeEntryErrors } from './descriptor.js';
export type { FieldEntry } from './descriptor.js';
export { parseIni, iniToDescriptor } from './ini.js';
export type { IniSections } from './ini.js';
export { SchemaRegistry, loadSchema, readDescriptorFile } from './registry.js';
export type { LoadSchemaOptions } from './registry.js';
