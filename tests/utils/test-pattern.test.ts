import { describe, it, expect } from 'vitest';
import {
  globToRegExp,
  isExcluded,
  matchExclusion,
  matchGlob,
  normalizeRelativePath,
} from '../../src/utils/pattern.js';

describe('matchGlob – single segment wildcards', () => {
  it('matches * within one segment only', () => {
    expect(matchGlob('*.csv', 'summary.csv')).toBe(true);
    expect(matchGlob('*.csv', 'run/summary.csv')).toBe(false);
  });

  it('matches ? as exactly one character', () => {
    expect(matchGlob('barcode0?', 'barcode07')).toBe(true);
    expect(matchGlob('barcode0?', 'barcode0')).toBe(false);
  });

  it('supports character classes and negation', () => {
    expect(matchGlob('run[12]', 'run1')).toBe(true);
    expect(matchGlob('run[12]', 'run3')).toBe(false);
    expect(matchGlob('run[!12]', 'run3')).toBe(true);
  });

  it('supports brace alternatives', () => {
    expect(matchGlob('*.{csv,tsv}', 'a.tsv')).toBe(true);
    expect(matchGlob('*.{csv,tsv}', 'a.txt')).toBe(false);
  });

  it('escapes regex specials', () => {
    expect(matchGlob('summary.bam_flagstats.csv', 'summary.bam_flagstats.csv')).toBe(true);
    expect(matchGlob('summary.bam_flagstats.csv', 'summaryXbam_flagstats.csv')).toBe(false);
    expect(matchGlob('a+b(1)', 'a+b(1)')).toBe(true);
  });
});

describe('matchGlob – recursive wildcard', () => {
  it('matches zero directory levels', () => {
    expect(matchGlob('**/*fastq_pass', 'fastq_pass')).toBe(true);
    expect(matchGlob('**/*fastq_pass', 'sample_fastq_pass')).toBe(true);
  });

  it('matches many directory levels', () => {
    expect(matchGlob('**/*fastq_pass', 'run1/sub/fastq_pass')).toBe(true);
    expect(matchGlob('**/summary', 'a/b/c/summary')).toBe(true);
    expect(matchGlob('**/summary', 'a/b/c/summary.csv')).toBe(false);
  });

  it('matches everything below a prefix with a trailing **', () => {
    expect(matchGlob('logs/**', 'logs/a/b.txt')).toBe(true);
    expect(matchGlob('logs/**', 'other/a.txt')).toBe(false);
  });

  it('treats ** inside a segment like *', () => {
    expect(matchGlob('a**b', 'axxb')).toBe(true);
    expect(matchGlob('a**b', 'ax/xb')).toBe(false);
  });
});

describe('globToRegExp', () => {
  it('caches compiled patterns', () => {
    expect(globToRegExp('**/*.csv')).toBe(globToRegExp('./**/*.csv'));
  });
});

describe('normalizeRelativePath', () => {
  it('normalizes separators and leading markers', () => {
    expect(normalizeRelativePath('./a\\b/c')).toBe('a/b/c');
    expect(normalizeRelativePath('/a/b')).toBe('a/b');
  });
});

describe('matchExclusion', () => {
  it('matches the basename at any depth when the pattern has no slash', () => {
    expect(matchExclusion('sequencing_summary_*.txt', 'sequencing_summary_ab.txt', false)).toBe(true);
    expect(matchExclusion('sequencing_summary_*.txt', 'deep/sequencing_summary_ab.txt', false)).toBe(true);
  });

  it('restricts trailing-slash patterns to directories', () => {
    expect(matchExclusion('barcodes/', 'barcodes', true)).toBe(true);
    expect(matchExclusion('barcodes/', 'barcodes', false)).toBe(false);
    expect(matchExclusion('barcodes/', 'x/barcodes', true)).toBe(true);
  });

  it('anchors patterns with an inner slash to the copy root', () => {
    expect(matchExclusion('logs/*.log', 'logs/a.log', false)).toBe(true);
    expect(matchExclusion('logs/*.log', 'x/logs/a.log', false)).toBe(false);
  });

  it('ignores blank patterns', () => {
    expect(matchExclusion('  ', 'anything', false)).toBe(false);
  });

  it('isExcluded checks every pattern', () => {
    expect(isExcluded(['*.fastq.csv', 'barcodes/'], 'summary.fastq.csv', false)).toBe(true);
    expect(isExcluded(['*.fastq.csv', 'barcodes/'], 'summary.csv', false)).toBe(false);
    expect(isExcluded([], 'summary.csv', false)).toBe(false);
  });
});
