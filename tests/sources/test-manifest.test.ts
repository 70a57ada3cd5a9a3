import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_JOIN_NAME, loadManifest, parseManifest } from '../../src/sources/manifest.js';
import { discoverFiles } from '../../src/sources/discover.js';
import { ConfigError, ConfigNotFoundError } from '../../src/errors.js';
import { silentLogger } from '../../src/observability/context-logger.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'manifest-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('parseManifest', () => {
  it('fills defaults and resolves schema paths against the base directory', () => {
    const manifest = parseManifest(
      { sources: { sample: { schema: 'schemas/sample.yml', identifier: 'SAMPLE_ID', files: 'samples/*.csv' } } },
      '/project',
    );
    expect(manifest.sources).toEqual([
      {
        kind: 'sample',
        category: 'sample',
        schemaPath: join('/project', 'schemas', 'sample.yml'),
        identifier: 'SAMPLE_ID',
        cardinality: 'one',
        files: ['samples/*.csv'],
        sheet: null,
        delimiter: null,
        primary: undefined,
        experimentId: null,
      },
    ]);
    expect(manifest.joins).toEqual({ [DEFAULT_JOIN_NAME]: ['sample'] });
    expect(manifest.precedence).toBeNull();
  });

  it('rejects joins naming unknown sources', () => {
    expect(() =>
      parseManifest(
        {
          sources: { sample: { schema: 's.yml', identifier: 'ID', files: ['*.csv'] } },
          joins: { all: ['sample', 'sequence'] },
        },
        '/project',
      ),
    ).toThrow("Join 'all' names unknown source 'sequence'");
  });

  it('rejects malformed manifests', () => {
    expect(() => parseManifest({ sources: { sample: { schema: 's.yml' } } }, '/project')).toThrow(ConfigError);
    expect(() => parseManifest({ sources: {} }, '/project')).toThrow('Source manifest declares no sources');
    expect(() =>
      parseManifest(
        { sources: { s: { schema: 's.yml', identifier: 'ID', files: ['*.csv'], cardinality: 'several' } } },
        '/project',
      ),
    ).toThrow(/^Invalid source manifest: \/sources\/s\/cardinality/);
  });
});

describe('loadManifest', () => {
  it('reads the bundled example manifest', () => {
    const path = fileURLToPath(new URL('../../examples/manifest.yml', import.meta.url));
    const manifest = loadManifest(path);
    expect(manifest.sources.map((s) => [s.kind, s.cardinality])).toEqual([
      ['experiment', 'one'],
      ['reaction', 'many'],
      ['sample', 'one'],
      ['sequence', 'one'],
    ]);
    expect(manifest.precedence).toEqual(['experimental', 'sample', 'sequence']);
    expect(manifest.sources[3]?.experimentId).toEqual({ column: 'expt_id', pattern: null });
    expect(manifest.joins).toEqual({ experiments: ['experiment', 'reaction'], samples: ['sample', 'sequence'] });
  });

  it('raises ConfigNotFoundError for a missing file', () => {
    expect(() => loadManifest(join(tempDir, 'missing.yml'))).toThrow(ConfigNotFoundError);
  });
});

describe('discoverFiles', () => {
  it('matches glob patterns below the base directory', () => {
    for (const rel of ['samples/a.csv', 'samples/b.csv', 'samples/notes.txt', 'runs/r1/summary.csv']) {
      const path = join(tempDir, rel);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, 'x');
    }
    const found = discoverFiles(tempDir, ['samples/*.csv', join(tempDir, 'runs', '**', 'summary.csv')], 16, silentLogger());
    expect(found).toEqual([
      join(tempDir, 'runs', 'r1', 'summary.csv'),
      join(tempDir, 'samples', 'a.csv'),
      join(tempDir, 'samples', 'b.csv'),
    ]);
  });
});
