/**
 * TabularLoader: reads spreadsheets, delimited text and JSON summaries into RawRows.
 *
 * `load()` returns a lazy async sequence; nothing is opened until the first row is pulled,
 * and every call starts a fresh pass over the file.
 */

import { createReadStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import csv from 'csv-parser';
import * as XLSX from 'xlsx';
import { SourceUnreadableError, errorMessage } from '../errors.js';
import type { RunContext } from '../context.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import type { InjectedMismatch, LoadOptions, RawRow, RawValue, SourceLocation, TabularFormat } from './types.js';

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls']);
const DEFAULT_DELIMITERS: Record<string, string> = {
  '.csv': ',',
  '.tsv': '\t',
  '.txt': '\t',
};

export function formatOf(path: string): TabularFormat | null {
  const ext = extname(path).toLowerCase();
  if (SPREADSHEET_EXTENSIONS.has(ext)) return 'spreadsheet';
  if (ext in DEFAULT_DELIMITERS) return 'delimited';
  if (ext === '.json') return 'json';
  return null;
}

function isBlank(value: RawValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function headerName(value: RawValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = value instanceof Date ? value.toISOString() : String(value);
  const name = text.replace(/^\uFEFF/, '');
  return name.trim() === '' ? null : name;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return JSON.stringify(value);
}

export class TabularLoader {
  private _skipBlankRows: boolean;
  private _logger: ContextLogger;

  constructor(context?: RunContext) {
    this._skipBlankRows = context?.config.getBoolean('loader.skip_blank_rows', true) ?? true;
    this._logger = context?.logger('tabular') ?? silentLogger();
  }

  /**
   * Yield the rows of `path`. Failures to open or decode the file surface as
   * {@link SourceUnreadableError} on the first iteration.
   */
  load(path: string, options?: LoadOptions): AsyncIterable<RawRow> {
    const skipBlankRows = options?.skipBlankRows ?? this._skipBlankRows;
    const opts: LoadOptions = { ...options, skipBlankRows };
    const format = formatOf(path);
    if (format === 'spreadsheet') return this._loadSpreadsheet(path, opts);
    if (format === 'json') return this._loadJson(path, opts);
    if (format === 'delimited' || opts.delimiter) return this._loadDelimited(path, opts);
    return failing(new SourceUnreadableError(path, `unsupported file type '${extname(path)}'`));
  }

  /** Read every row eagerly. */
  async loadAll(path: string, options?: LoadOptions): Promise<RawRow[]> {
    const rows: RawRow[] = [];
    for await (const row of this.load(path, options)) {
      rows.push(row);
    }
    return rows;
  }

  async sheetNames(path: string): Promise<string[]> {
    const workbook = await readWorkbook(path, { bookSheets: true });
    return [...workbook.SheetNames];
  }

  private async *_loadSpreadsheet(path: string, options: LoadOptions): AsyncGenerator<RawRow> {
    const workbook = await readWorkbook(path, { cellDates: true });
    const sheetName = options.sheet ?? workbook.SheetNames[0];
    if (sheetName === undefined) {
      throw new SourceUnreadableError(path, 'workbook has no sheets');
    }
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) {
      throw new SourceUnreadableError(path, `sheet '${sheetName}' not found`);
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: true });
    const [headerRow, ...body] = grid;
    if (headerRow === undefined) return;
    const header = trimHeader(headerRow.map((cell) => headerName(toRawValue(cell))));
    this._logger.debug('Reading sheet', { path, sheet: sheetName, rows: body.length });

    let row = 0;
    for (const cells of body) {
      const values = cells.map(toRawValue);
      if (options.skipBlankRows && values.every(isBlank)) continue;
      // Rows are padded to the sheet's used range.
      const cellCount = Math.max(countCells(values, header.length), header.length);
      row += 1;
      yield assembleRow({ path, sheet: sheetName, row }, header, values, cellCount, options);
    }
  }

  private async *_loadDelimited(path: string, options: LoadOptions): AsyncGenerator<RawRow> {
    await statOrThrow(path);
    const separator = options.delimiter ?? DEFAULT_DELIMITERS[extname(path).toLowerCase()] ?? ',';

    const input = createReadStream(path);
    const parser = input.pipe(csv({ separator, headers: false, strict: false }));
    input.on('error', (e) => parser.destroy(e));

    let header: (string | null)[] | null = null;
    let row = 0;
    try {
      for await (const chunk of parser) {
        const record: unknown = chunk;
        if (!isStringRecord(record)) continue;
        const values: RawValue[] = Object.keys(record)
          .map(Number)
          .sort((a, b) => a - b)
          .map((index) => record[String(index)] ?? null);
        if (header === null) {
          header = trimHeader(values.map(headerName));
          continue;
        }
        if (options.skipBlankRows && values.every(isBlank)) continue;
        row += 1;
        yield assembleRow({ path, sheet: null, row }, header, values, countCells(values, header.length), options);
      }
    } catch (e) {
      if (e instanceof SourceUnreadableError) throw e;
      throw new SourceUnreadableError(path, errorMessage(e), { cause: e instanceof Error ? e : undefined });
    } finally {
      input.destroy();
    }
  }

  private async *_loadJson(path: string, options: LoadOptions): AsyncGenerator<RawRow> {
    let payload: unknown;
    try {
      payload = JSON.parse(await readFile(path, 'utf-8'));
    } catch (e) {
      throw new SourceUnreadableError(path, errorMessage(e), { cause: e instanceof Error ? e : undefined });
    }

    const objects: unknown[] = Array.isArray(payload) ? payload : [payload];
    let row = 0;
    for (const item of objects) {
      if (!isPlainObject(item)) {
        throw new SourceUnreadableError(path, 'JSON payload must be an object or an array of objects');
      }
      const cells = new Map<string, RawValue>(Object.entries(item).map(([key, value]) => [key, toRawValue(value)]));
      if (options.skipBlankRows && [...cells.values()].every(isBlank)) continue;
      const mismatches = addInjected(cells, options);
      row += 1;
      yield { cells, location: { path, sheet: null, row }, parseIssue: null, mismatches };
    }
  }
}

/** Drop trailing unnamed header cells, which spreadsheets and trailing delimiters produce. */
function trimHeader(header: (string | null)[]): (string | null)[] {
  let end = header.length;
  while (end > 0 && header[end - 1] === null) end--;
  return header.slice(0, end);
}

/** Cell count of a row, ignoring trailing blank cells that lie past the header. */
function countCells(values: readonly RawValue[], headerLength: number): number {
  let count = values.length;
  while (count > headerLength && isBlank(values[count - 1])) count--;
  return count;
}

function assembleRow(
  location: SourceLocation,
  header: readonly (string | null)[],
  values: readonly RawValue[],
  cellCount: number,
  options: LoadOptions,
): RawRow {
  const cells = new Map<string, RawValue>();
  header.forEach((name, index) => {
    if (name !== null && !cells.has(name)) {
      cells.set(name, values[index] ?? null);
    }
  });
  const mismatches = addInjected(cells, options);
  const parseIssue = cellCount === header.length ? null : `expected ${header.length} cells, found ${cellCount}`;
  return { cells, location, parseIssue, mismatches };
}

/**
 * Fill injected columns. A non-blank source value that disagrees with the injected one is kept
 * and reported as a mismatch.
 */
function addInjected(cells: Map<string, RawValue>, options: LoadOptions): InjectedMismatch[] {
  const mismatches: InjectedMismatch[] = [];
  for (const [column, value] of Object.entries(options.inject ?? {})) {
    const found = cells.get(column);
    if (found === undefined || isBlank(found)) {
      cells.set(column, value);
      continue;
    }
    if (cellText(found) !== cellText(value)) {
      mismatches.push({ column, injected: cellText(value), found: cellText(found) });
    }
  }
  return mismatches;
}

function cellText(value: RawValue): string {
  if (value === null) return '';
  return value instanceof Date ? value.toISOString() : String(value).trim();
}

async function statOrThrow(path: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await stat(path)).isFile();
  } catch (e) {
    throw new SourceUnreadableError(path, errorMessage(e), { cause: e instanceof Error ? e : undefined });
  }
  if (!isFile) {
    throw new SourceUnreadableError(path, 'not a regular file');
  }
}

async function readWorkbook(path: string, parsing: XLSX.ParsingOptions): Promise<XLSX.WorkBook> {
  await statOrThrow(path);
  try {
    return XLSX.read(await readFile(path), { ...parsing, type: 'buffer' });
  } catch (e) {
    throw new SourceUnreadableError(path, errorMessage(e), { cause: e instanceof Error ? e : undefined });
  }
}

async function* failing(error: Error): AsyncGenerator<RawRow> {
  throw error;
}
