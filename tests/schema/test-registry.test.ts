import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SchemaRegistry, loadSchema, readDescriptorFile } from '../../src/schema/registry.js';
import { DataType } from '../../src/schema/types.js';
import { SchemaError } from '../../src/errors.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'schema-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function write(name: string, content: string): string {
  const path = join(tempDir, name);
  writeFileSync(path, content);
  return path;
}

const SAMPLE_DESCRIPTOR = {
  STUDY_ID: { field: 'study_id', label: 'Study ID', datatype: 'str', required: true },
  DATE: { field: 'date', label: 'Date Enrolled', dateformat: '%Y/%m/%d' },
  PARASITAEMIA: { field: 'parasitaemia_p/ul', datatype: 'int' },
};

describe('loadSchema', () => {
  it('builds ordered field specs with defaults applied', () => {
    const schema = loadSchema(SAMPLE_DESCRIPTOR, { kind: 'sample' });
    expect(schema.kind).toBe('sample');
    expect(schema.attributeNames).toEqual(['STUDY_ID', 'DATE', 'PARASITAEMIA']);

    const date = schema.resolve('DATE');
    expect(date?.datatype).toBe(DataType.Date);
    expect(date?.dateFormat).toBe('%Y/%m/%d');
    expect(date?.compiledDateFormat?.tokens).toBe('yyyy/MM/dd');
    expect(date?.required).toBe(false);

    const parasitaemia = schema.resolve('PARASITAEMIA');
    expect(parasitaemia?.label).toBe('parasitaemia_p/ul');
    expect(parasitaemia?.datatype).toBe(DataType.Int);
    expect(parasitaemia?.dateFormat).toBeNull();

    expect(schema.resolve('STUDY_ID')?.required).toBe(true);
  });

  it('defaults datatype to str without a date format', () => {
    const schema = loadSchema({ PROVINCE: { field: 'province' } }, { kind: 'sample' });
    expect(schema.resolve('PROVINCE')?.datatype).toBe(DataType.Str);
  });

  it('returns null for unknown attributes', () => {
    const schema = loadSchema(SAMPLE_DESCRIPTOR, { kind: 'sample' });
    expect(schema.resolve('MISSING')).toBeNull();
    expect(schema.resolveSourceField('date')?.attributeName).toBe('DATE');
  });

  it('has no identifier unless one is designated', () => {
    const schema = loadSchema(SAMPLE_DESCRIPTOR, { kind: 'sample' });
    expect(schema.identifiers).toEqual([]);
    expect(schema.primaryIdentifier).toBeNull();
  });

  it('makes designated identifiers required', () => {
    const schema = loadSchema(
      { SAMPLE_ID: { field: 'sample_id' }, BARCODE: { field: 'barcode', identifier: true } },
      { kind: 'sequence', identifiers: ['SAMPLE_ID'] },
    );
    expect(schema.identifiers).toEqual(['SAMPLE_ID', 'BARCODE']);
    expect(schema.primaryIdentifier).toBe('SAMPLE_ID');
    expect(schema.resolve('SAMPLE_ID')?.required).toBe(true);
    expect(schema.resolve('BARCODE')?.required).toBe(true);
  });

  it('is immutable', () => {
    const schema = loadSchema(SAMPLE_DESCRIPTOR, { kind: 'sample' });
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fields[0])).toBe(true);
  });

  it('rejects two attributes mapping the same source field', () => {
    expect(() =>
      loadSchema({ A: { field: 'col' }, B: { field: 'col' } }, { kind: 'sample' }),
    ).toThrow("Source field 'col' is mapped by both 'A' and 'B'");
  });

  it('rejects a date field without a date format', () => {
    expect(() => loadSchema({ DATE: { field: 'date', datatype: 'date' } }, { kind: 'sample' })).toThrow(
      "Date field 'DATE' has no dateformat",
    );
  });

  it('rejects unknown datatypes', () => {
    expect(() => loadSchema({ N: { field: 'n', datatype: 'decimal' } }, { kind: 'sample' })).toThrow(SchemaError);
  });

  it('rejects unsupported date directives', () => {
    expect(() => loadSchema({ D: { field: 'd', dateformat: '%Q' } }, { kind: 'sample' })).toThrow(
      "Entry 'D': Unsupported directive '%Q' in date format '%Q'",
    );
  });

  it('rejects entries without a field', () => {
    expect(() => loadSchema({ A: { label: 'A' } }, { kind: 'sample' })).toThrow(/Entry 'A' is malformed/);
  });

  it('rejects entries that are not mappings', () => {
    expect(() => loadSchema({ A: 'a' }, { kind: 'sample' })).toThrow("Entry 'A' must be a mapping, got string");
  });

  it('rejects designated identifiers that are not declared', () => {
    expect(() => loadSchema(SAMPLE_DESCRIPTOR, { kind: 'sample', identifiers: ['SAMPLE_ID'] })).toThrow(
      "Identifier 'SAMPLE_ID' is not declared in schema 'sample'",
    );
  });

  it('accepts numeric field names', () => {
    const schema = loadSchema({ YEAR: { field: 2024 } }, { kind: 'sample' });
    expect(schema.resolve('YEAR')?.sourceField).toBe('2024');
  });
});

describe('readDescriptorFile', () => {
  it('reads YAML descriptors', () => {
    const path = write('sample.yml', 'STUDY_ID:\n  field: study_id\n  label: Study ID\n');
    expect(readDescriptorFile(path)).toEqual({ STUDY_ID: { field: 'study_id', label: 'Study ID' } });
  });

  it('treats duplicated YAML keys as a collision', () => {
    const path = write('dup.yml', 'A:\n  field: a\nA:\n  field: b\n');
    expect(() => readDescriptorFile(path)).toThrow(SchemaError);
  });

  it('reads INI descriptors', () => {
    const path = write('sample.ini', '[field]\nSTUDY_ID=study_id\n[label]\nSTUDY_ID=Study ID\n');
    expect(readDescriptorFile(path)).toEqual({ STUDY_ID: { field: 'study_id', label: 'Study ID' } });
  });

  it('rejects missing files with the path attached', () => {
    const missing = join(tempDir, 'missing.yml');
    try {
      readDescriptorFile(missing);
      expect.unreachable('should have thrown');
    } catch (e) {
      expect(e).toBeInstanceOf(SchemaError);
      expect((e as SchemaError).source).toBe(missing);
    }
  });

  it('rejects empty and non-mapping documents', () => {
    expect(() => readDescriptorFile(write('empty.yml', ''))).toThrow('Schema descriptor is empty or not a mapping');
    expect(() => readDescriptorFile(write('list.yml', '- a\n- b\n'))).toThrow(
      'Schema descriptor is empty or not a mapping',
    );
  });

  it('rejects unsupported extensions', () => {
    expect(() => readDescriptorFile(write('schema.json', '{}'))).toThrow("Unsupported schema descriptor extension '.json'");
  });
});

describe('SchemaRegistry', () => {
  it('keeps one independent schema per kind', () => {
    const registry = new SchemaRegistry();
    registry.load('sample', SAMPLE_DESCRIPTOR);
    registry.load('sequence', { SAMPLE_ID: { field: 'sample_id' } }, { identifiers: ['SAMPLE_ID'] });

    expect(registry.kinds()).toEqual(['sample', 'sequence']);
    expect(registry.has('sample')).toBe(true);
    expect(registry.get('sequence').primaryIdentifier).toBe('SAMPLE_ID');
    expect(registry.resolve('sample', 'DATE')?.sourceField).toBe('date');
    expect(registry.resolve('sequence', 'DATE')).toBeNull();
    expect(registry.resolve('other', 'DATE')).toBeNull();
  });

  it('loads descriptor files and records their source', () => {
    const path = write('sample.yml', 'SAMPLE_ID:\n  field: sample_id\n');
    const registry = new SchemaRegistry();
    const schema = registry.loadFile('sample', path, { identifiers: ['SAMPLE_ID'] });
    expect(schema.source).toBe(path);
    expect(schema.identifiers).toEqual(['SAMPLE_ID']);
  });

  it('refuses to load a kind twice', () => {
    const registry = new SchemaRegistry();
    registry.load('sample', SAMPLE_DESCRIPTOR);
    expect(() => registry.load('sample', SAMPLE_DESCRIPTOR)).toThrow("Schema for kind 'sample' is already loaded");
  });

  it('is read-only once sealed', () => {
    const registry = new SchemaRegistry();
    registry.load('sample', SAMPLE_DESCRIPTOR);
    registry.seal();
    expect(registry.sealed).toBe(true);
    expect(() => registry.load('sequence', SAMPLE_DESCRIPTOR)).toThrow(SchemaError);
    expect(registry.get('sample').size).toBe(3);
  });

  it('throws for unknown kinds', () => {
    expect(() => new SchemaRegistry().get('nope')).toThrow("No schema loaded for kind 'nope'");
  });
});
