import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  exportColumns,
  exportDelimited,
  flattenRecord,
  isHeaderMode,
  quoteCell,
  toDelimited,
} from '../../src/export/exporter.js';
import { buildIssueReport, writeIssueReport } from '../../src/export/report.js';
import type { ReconciledRecord } from '../../src/reconcile/types.js';
import { loadSchema } from '../../src/schema/registry.js';
import { TabularLoader } from '../../src/tabular/loader.js';
import { MetadataValidator } from '../../src/validation/validator.js';
import { IssueKind } from '../../src/validation/types.js';
import type { TypedValue, ValidationIssue } from '../../src/validation/types.js';
import { SourceUnreadableError } from '../../src/errors.js';

const sampleSchema = loadSchema(
  {
    SAMPLE_ID: { field: 'sample_id', label: 'Sample ID' },
    STUDY_ID: { field: 'study_id', required: true },
    DATE: { field: 'date', label: 'Date Enrolled', dateformat: '%Y/%m/%d' },
  },
  { kind: 'sample', identifiers: ['SAMPLE_ID'] },
);
const sequenceSchema = loadSchema(
  {
    SAMPLE_ID: { field: 'sample_id' },
    READS: { field: 'n_reads', datatype: 'int' },
  },
  { kind: 'sequence', identifiers: ['SAMPLE_ID'] },
);

function record(
  identifier: string,
  attributes: Record<string, TypedValue>,
  children: Record<string, Record<string, TypedValue>[]> = {},
): ReconciledRecord {
  return { identifier, attributes, children, presentIn: new Set(), conflicts: {}, issues: [] };
}

const RECORDS = [
  record('S1', { SAMPLE_ID: 'S1', STUDY_ID: 'ST, 1', DATE: new Date(2024, 2, 1), READS: 100 }),
  record('S2', { SAMPLE_ID: 'S2', STUDY_ID: 'ST2', DATE: null, READS: null }),
];

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'export-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('toDelimited', () => {
  it('writes one column per attribute, dates in their schema format', () => {
    expect(toDelimited(RECORDS, { schemas: [sampleSchema, sequenceSchema] })).toBe(
      'sample_id,study_id,date,n_reads\nS1,"ST, 1",2024/03/01,100\nS2,ST2,,\n',
    );
  });

  it('supports label and attribute headers', () => {
    const labels = toDelimited([], { schemas: [sampleSchema, sequenceSchema], header: 'label' });
    expect(labels).toBe('Sample ID,study_id,Date Enrolled,n_reads\n');
    const attributes = toDelimited([], { schemas: [sampleSchema, sequenceSchema], header: 'attribute' });
    expect(attributes).toBe('SAMPLE_ID,STUDY_ID,DATE,READS\n');
  });

  it('honours a tab delimiter', () => {
    const text = toDelimited(RECORDS.slice(0, 1), { schemas: [sampleSchema], delimiter: '\t' });
    expect(text).toBe('sample_id\tstudy_id\tdate\nS1\tST, 1\t2024/03/01\n');
  });
});

describe('flattening child rows', () => {
  const experimentSchema = loadSchema({ EXPT_ID: { field: 'expt_id' }, NOTE: { field: 'note' } }, { kind: 'experiment' });
  const reactionSchema = loadSchema({ EXPT_ID: { field: 'expt_id' }, RXN: { field: 'rxn_id' } }, { kind: 'reaction' });
  const nested = [
    record(
      'E1',
      { EXPT_ID: 'E1', NOTE: 'x' },
      {
        reaction: [
          { EXPT_ID: 'E1', RXN: 'R1' },
          { EXPT_ID: 'E1', RXN: 'R2' },
        ],
      },
    ),
    record('E3', { EXPT_ID: 'E3', NOTE: 'y' }, { reaction: [] }),
  ];

  it('puts parent columns before child columns', () => {
    const columns = exportColumns(nested, { schemas: [reactionSchema, experimentSchema] });
    expect(columns.map((c) => c.attribute)).toEqual(['EXPT_ID', 'NOTE', 'RXN']);
  });

  it('repeats the parent on each child line', () => {
    expect(flattenRecord(nested[0] ?? record('x', {}))).toEqual([
      { EXPT_ID: 'E1', NOTE: 'x', RXN: 'R1' },
      { EXPT_ID: 'E1', NOTE: 'x', RXN: 'R2' },
    ]);
    expect(toDelimited(nested, { schemas: [experimentSchema, reactionSchema] })).toBe(
      'expt_id,note,rxn_id\nE1,x,R1\nE1,x,R2\nE3,y,\n',
    );
  });
});

describe('quoteCell / isHeaderMode', () => {
  it('quotes delimiters, quotes and newlines', () => {
    expect(quoteCell('plain', ',')).toBe('plain');
    expect(quoteCell('say "hi"', ',')).toBe('"say ""hi"""');
    expect(quoteCell('two\nlines', ',')).toBe('"two\nlines"');
    expect(quoteCell('a,b', '\t')).toBe('a,b');
  });

  it('recognises header modes', () => {
    expect(isHeaderMode('label')).toBe(true);
    expect(isHeaderMode('column')).toBe(false);
  });
});

describe('exportDelimited', () => {
  it('writes a file that loads back through the same schemas', async () => {
    const path = join(tempDir, 'out', 'samples.csv');
    const written = await exportDelimited(RECORDS, path, { schemas: [sampleSchema, sequenceSchema] });
    expect(written).toEqual({ path, rows: 2 });

    const rows = await new TabularLoader().loadAll(path);
    const validator = new MetadataValidator();
    const samples = await validator.validate(rows, sampleSchema);
    expect(samples.issues).toEqual([]);
    expect(samples.records.map((r) => r.values)).toEqual([
      { SAMPLE_ID: 'S1', STUDY_ID: 'ST, 1', DATE: new Date(2024, 2, 1) },
      { SAMPLE_ID: 'S2', STUDY_ID: 'ST2', DATE: null },
    ]);
    const sequences = await validator.validate(rows, sequenceSchema);
    expect(sequences.records.map((r) => r.values['READS'])).toEqual([100, null]);
  });
});

describe('issue report', () => {
  const validationIssue: ValidationIssue = {
    kind: IssueKind.TypeMismatch,
    table: 'sample',
    attribute: 'READS',
    location: { path: 'samples.csv', sheet: null, row: 3 },
    message: "READS: 'lots' is not a valid int",
    value: 'lots',
  };

  it('counts issues by kind and lists unreadable sources', () => {
    const report = buildIssueReport({
      runId: 'run-1',
      validation: [validationIssue, validationIssue],
      reconciliation: [
        {
          kind: IssueKind.OrphanIdentifier,
          identifier: 'S2',
          tables: ['sequence'],
          attribute: null,
          message: "Identifier 'S2' is missing from sequence",
          chosen: null,
          rejected: [],
          recordProduced: true,
          locations: [],
        },
      ],
      unreadable: [new SourceUnreadableError('gone.csv', 'ENOENT')],
    });

    expect(report.runId).toBe('run-1');
    expect(report.counts).toEqual({ TypeMismatch: 2, OrphanIdentifier: 1 });
    expect(report.unreadableSources).toEqual([{ path: 'gone.csv', reason: 'ENOENT' }]);
    expect(report.aggregation).toBeNull();
  });

  it('writes the report as JSON', async () => {
    const path = join(tempDir, 'issues.json');
    await writeIssueReport(path, buildIssueReport({ validation: [validationIssue] }));
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    expect(parsed).toMatchObject({ runId: null, counts: { TypeMismatch: 1 }, validation: [{ value: 'lots' }] });
  });
});
