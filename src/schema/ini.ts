/**
 * INI schema descriptors: `[field]`, `[datatype]`, `[dateformat]`, `[label]`, `[required]`
 * and `[identifier]` sections keyed by attribute name. Converted into the same entry mapping
 * the YAML form produces.
 */

import { SchemaError } from '../errors.js';

const SEC_RE = /^\s*\[([^\]]+)\]\s*$/;
const KV_RE = /^\s*([^=:\s][^=:]*?)\s*[=:]\s*(.*?)\s*$/;
const COMMENT_RE = /^\s*[#;]/;

const ENTRY_SECTIONS: Record<string, string> = {
  field: 'field',
  datatype: 'datatype',
  dateformat: 'dateformat',
  label: 'label',
  required: 'required',
  identifier: 'identifier',
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type IniSections = Map<string, Map<string, string>>;

export function parseIni(text: string, source: string | null = null): IniSections {
  const sections: IniSections = new Map();
  let current: Map<string, string> | null = null;
  let currentName: string | null = null;

  text.split(/\r?\n/).forEach((raw, index) => {
    if (raw.trim() === '' || COMMENT_RE.test(raw)) return;
    const sm = SEC_RE.exec(raw);
    if (sm) {
      currentName = sm[1].trim().toLowerCase();
      const existing = sections.get(currentName);
      if (existing) {
        throw new SchemaError(`Duplicate section [${currentName}] at line ${index + 1}`, source);
      }
      current = new Map();
      sections.set(currentName, current);
      return;
    }
    const km = KV_RE.exec(raw);
    if (!km) {
      throw new SchemaError(`Cannot parse line ${index + 1}: '${raw.trim()}'`, source);
    }
    if (current === null) {
      throw new SchemaError(`Key outside of any section at line ${index + 1}`, source);
    }
    const key = km[1].toUpperCase();
    if (current.has(key)) {
      throw new SchemaError(`Attribute '${key}' declared twice in [${currentName}]`, source);
    }
    current.set(key, km[2].replace(/%%/g, '%'));
  });

  return sections;
}

function parseFlag(value: string, key: string, section: string, source: string | null): boolean {
  const lowered = value.toLowerCase();
  if (TRUE_VALUES.has(lowered)) return true;
  if (FALSE_VALUES.has(lowered)) return false;
  throw new SchemaError(`[${section}] ${key} must be a boolean, got '${value}'`, source);
}

/**
 * Turn INI text into `{ ATTRIBUTE: { field, label, ... } }`. Unknown sections are ignored.
 */
export function iniToDescriptor(text: string, source: string | null = null): Record<string, Record<string, unknown>> {
  const sections = parseIni(text, source);
  const fieldSection = sections.get('field');
  if (!fieldSection) {
    throw new SchemaError('INI descriptor has no [field] section', source);
  }

  const descriptor: Record<string, Record<string, unknown>> = {};
  for (const [key, value] of fieldSection) {
    descriptor[key] = { field: value };
  }

  for (const [sectionName, property] of Object.entries(ENTRY_SECTIONS)) {
    if (sectionName === 'field') continue;
    const section = sections.get(sectionName);
    if (!section) continue;
    for (const [key, value] of section) {
      const entry = descriptor[key];
      if (!entry) {
        throw new SchemaError(`Attribute '${key}' appears in [${sectionName}] but not in [field]`, source);
      }
      entry[property] = property === 'required' || property === 'identifier'
        ? parseFlag(value, key, sectionName, source)
        : value;
    }
  }

  return descriptor;
}
