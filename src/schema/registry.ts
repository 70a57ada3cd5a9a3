/**
 * Schema registry: turns declarative field descriptors into immutable Schemas.
 *
 * One Schema per source kind. Schemas are never merged; only the data they validate is
 * reconciled later. All descriptor parsing happens here so a malformed descriptor fails
 * in one place, before any data is read.
 */

import { readFileSync, existsSync } from 'node:fs';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import { SchemaError, errorMessage } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { compileDateFormat, DateFormatSyntaxError } from '../utils/dates.js';
import type { CompiledDateFormat } from '../utils/dates.js';
import { describeEntryErrors, isFieldEntry } from './descriptor.js';
import { iniToDescriptor } from './ini.js';
import { DATA_TYPES, DataType, isDataType, Schema } from './types.js';
import type { FieldSpec } from './types.js';

export interface LoadSchemaOptions {
  kind: string;
  /** Attributes to treat as identifiers in addition to entries flagged `identifier: true`. */
  identifiers?: readonly string[];
  source?: string | null;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildFieldSpec(attributeName: string, raw: unknown, identifiers: ReadonlySet<string>, source: string | null): FieldSpec {
  if (!isMapping(raw)) {
    throw new SchemaError(`Entry '${attributeName}' must be a mapping, got ${raw === null ? 'null' : typeof raw}`, source);
  }
  if (!isFieldEntry(raw)) {
    throw new SchemaError(`Entry '${attributeName}' is malformed: ${describeEntryErrors(raw).join('; ')}`, source);
  }

  const sourceField = String(raw.field);
  if (!sourceField.trim()) {
    throw new SchemaError(`Entry '${attributeName}' has an empty field name`, source);
  }

  const dateFormat = raw.dateformat ?? null;
  const declaredType = raw.datatype ?? null;
  let datatype: DataType;
  if (declaredType === null) {
    datatype = dateFormat ? DataType.Date : DataType.Str;
  } else if (isDataType(declaredType)) {
    datatype = declaredType;
  } else {
    throw new SchemaError(
      `Entry '${attributeName}' has unknown datatype '${declaredType}' (expected one of ${DATA_TYPES.join(', ')})`,
      source,
    );
  }

  if (datatype === DataType.Date && !dateFormat) {
    throw new SchemaError(`Date field '${attributeName}' has no dateformat`, source);
  }

  let compiledDateFormat: CompiledDateFormat | null = null;
  if (datatype === DataType.Date && dateFormat) {
    try {
      compiledDateFormat = compileDateFormat(dateFormat);
    } catch (e) {
      if (e instanceof DateFormatSyntaxError) {
        throw new SchemaError(`Entry '${attributeName}': ${e.message}`, source);
      }
      throw e;
    }
  }

  const identifier = raw.identifier === true || identifiers.has(attributeName);
  return {
    attributeName,
    sourceField,
    label: raw.label != null && String(raw.label).trim() ? String(raw.label) : sourceField,
    datatype,
    dateFormat: datatype === DataType.Date ? dateFormat : null,
    compiledDateFormat,
    required: identifier || raw.required === true,
    identifier,
  };
}

/**
 * Build a Schema from a parsed descriptor mapping of `ATTRIBUTE -> { field, label, ... }`.
 */
export function loadSchema(descriptor: unknown, options: LoadSchemaOptions): Schema {
  const source = options.source ?? null;
  if (!isMapping(descriptor)) {
    throw new SchemaError(`Schema descriptor for '${options.kind}' must be a mapping`, source);
  }

  const identifiers = new Set(options.identifiers ?? []);
  const fields: FieldSpec[] = [];
  const seenAttributes = new Set<string>();
  const seenSourceFields = new Map<string, string>();

  for (const [attributeName, raw] of Object.entries(descriptor)) {
    if (seenAttributes.has(attributeName)) {
      throw new SchemaError(`Attribute '${attributeName}' declared twice`, source);
    }
    const spec = buildFieldSpec(attributeName, raw, identifiers, source);
    const owner = seenSourceFields.get(spec.sourceField);
    if (owner !== undefined) {
      throw new SchemaError(
        `Source field '${spec.sourceField}' is mapped by both '${owner}' and '${attributeName}'`,
        source,
      );
    }
    seenAttributes.add(attributeName);
    seenSourceFields.set(spec.sourceField, attributeName);
    fields.push(spec);
  }

  for (const name of identifiers) {
    if (!seenAttributes.has(name)) {
      throw new SchemaError(`Identifier '${name}' is not declared in schema '${options.kind}'`, source);
    }
  }

  return new Schema(options.kind, fields, source);
}

/**
 * Read a descriptor file: `.yml`/`.yaml` mappings or `.ini` with per-property sections.
 */
export function readDescriptorFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new SchemaError(`Schema descriptor not found: ${path}`, path);
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new SchemaError(`Cannot read schema descriptor: ${errorMessage(e)}`, path);
  }

  const ext = extname(path).toLowerCase();
  if (ext === '.ini') {
    return iniToDescriptor(content, path);
  }
  if (ext !== '.yml' && ext !== '.yaml') {
    throw new SchemaError(`Unsupported schema descriptor extension '${ext}'`, path);
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (e) {
    // js-yaml rejects duplicated mapping keys, which is how attribute collisions show up
    throw new SchemaError(`Invalid YAML in schema descriptor: ${errorMessage(e)}`, path);
  }
  if (data === null || data === undefined || !isMapping(data)) {
    throw new SchemaError('Schema descriptor is empty or not a mapping', path);
  }
  return data;
}

export class SchemaRegistry {
  private _schemas: Map<string, Schema> = new Map();
  private _sealed = false;
  private _logger: ContextLogger;

  constructor(logger?: ContextLogger) {
    this._logger = logger ?? silentLogger();
  }

  load(kind: string, descriptor: unknown, options?: Omit<LoadSchemaOptions, 'kind'>): Schema {
    const source = options?.source ?? null;
    if (this._sealed) {
      throw new SchemaError(`Registry is sealed; cannot load schema '${kind}'`, source);
    }
    if (this._schemas.has(kind)) {
      throw new SchemaError(`Schema for kind '${kind}' is already loaded`, source);
    }
    const schema = loadSchema(descriptor, { ...options, kind });
    this._schemas.set(kind, schema);
    this._logger.debug('Schema loaded', {
      kind: schema.kind,
      fields: schema.size,
      identifiers: [...schema.identifiers],
      source: schema.source,
    });
    return schema;
  }

  loadFile(kind: string, path: string, options?: Pick<LoadSchemaOptions, 'identifiers'>): Schema {
    return this.load(kind, readDescriptorFile(path), { ...options, source: path });
  }

  /** Disallow further loads. Schemas are read-only once the run starts. */
  seal(): void {
    this._sealed = true;
  }

  get sealed(): boolean {
    return this._sealed;
  }

  has(kind: string): boolean {
    return this._schemas.has(kind);
  }

  get(kind: string): Schema {
    const schema = this._schemas.get(kind);
    if (!schema) {
      throw new SchemaError(`No schema loaded for kind '${kind}'`);
    }
    return schema;
  }

  kinds(): string[] {
    return [...this._schemas.keys()];
  }

  resolve(kind: string, attributeName: string): FieldSpec | null {
    return this._schemas.get(kind)?.resolve(attributeName) ?? null;
  }
}
