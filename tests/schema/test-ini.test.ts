import { describe, it, expect } from 'vitest';
import { iniToDescriptor, parseIni } from '../../src/schema/ini.js';
import { loadSchema } from '../../src/schema/registry.js';
import { DataType } from '../../src/schema/types.js';
import { SchemaError } from '../../src/errors.js';

const SAMPLES_INI = `# sample columns
[field]
sample_id=sample_id
DATE=date
PARASITAEMIA=parasitaemia_p/ul

[datatype]
; integers only
PARASITAEMIA=int

[dateformat]
DATE=%%Y/%%m/%%d

[label]
DATE=Date Enrolled

[notes]
ANYTHING=ignored
`;

describe('parseIni', () => {
  it('groups upper-cased keys by lower-cased section', () => {
    const sections = parseIni('[Field]\nabc = x\nDef: y\n');
    expect([...sections.keys()]).toEqual(['field']);
    expect(Object.fromEntries(sections.get('field') ?? [])).toEqual({ ABC: 'x', DEF: 'y' });
  });

  it('rejects duplicate options in a section', () => {
    expect(() => parseIni('[field]\nA=a\na=b\n', 'x.ini')).toThrow("Attribute 'A' declared twice in [field]");
  });

  it('rejects duplicate sections', () => {
    expect(() => parseIni('[field]\nA=a\n[field]\nB=b\n')).toThrow('Duplicate section [field] at line 3');
  });

  it('rejects keys before the first section', () => {
    expect(() => parseIni('A=a\n')).toThrow('Key outside of any section at line 1');
  });

  it('rejects unparseable lines', () => {
    expect(() => parseIni('[field]\njust words\n')).toThrow("Cannot parse line 2: 'just words'");
  });
});

describe('iniToDescriptor', () => {
  it('merges per-property sections into entries', () => {
    expect(iniToDescriptor(SAMPLES_INI)).toEqual({
      SAMPLE_ID: { field: 'sample_id' },
      DATE: { field: 'date', dateformat: '%Y/%m/%d', label: 'Date Enrolled' },
      PARASITAEMIA: { field: 'parasitaemia_p/ul', datatype: 'int' },
    });
  });

  it('produces a loadable schema', () => {
    const schema = loadSchema(iniToDescriptor(SAMPLES_INI), { kind: 'sample', identifiers: ['SAMPLE_ID'] });
    expect(schema.attributeNames).toEqual(['SAMPLE_ID', 'DATE', 'PARASITAEMIA']);
    expect(schema.resolve('DATE')?.datatype).toBe(DataType.Date);
    expect(schema.resolve('PARASITAEMIA')?.datatype).toBe(DataType.Int);
    expect(schema.primaryIdentifier).toBe('SAMPLE_ID');
  });

  it('parses boolean flag sections', () => {
    const descriptor = iniToDescriptor('[field]\nA=a\nB=b\n[required]\nA=yes\nB=off\n');
    expect(descriptor).toEqual({ A: { field: 'a', required: true }, B: { field: 'b', required: false } });
    expect(() => iniToDescriptor('[field]\nA=a\n[identifier]\nA=maybe\n')).toThrow(
      "[identifier] A must be a boolean, got 'maybe'",
    );
  });

  it('requires a [field] section', () => {
    expect(() => iniToDescriptor('[label]\nA=Label\n')).toThrow('INI descriptor has no [field] section');
  });

  it('rejects properties for attributes missing from [field]', () => {
    expect(() => iniToDescriptor('[field]\nA=a\n[label]\nB=Label\n')).toThrow(SchemaError);
  });
});
