/**
 * Raw tabular data as read from a source file, before any schema is applied.
 */

/** Spreadsheets yield numbers, booleans and dates; delimited text yields strings. */
export type RawValue = string | number | boolean | Date | null;

export interface SourceLocation {
  readonly path: string;
  readonly sheet: string | null;
  /** 1-based index of the data record within the source; the header row is not counted. */
  readonly row: number;
}

export interface RawRow {
  readonly cells: ReadonlyMap<string, RawValue>;
  readonly location: SourceLocation;
  /** Set when the row could not be read cleanly, e.g. its cell count differs from the header. */
  readonly parseIssue: string | null;
  /** Injected columns whose value in the file disagrees with the injected one. */
  readonly mismatches: readonly InjectedMismatch[];
}

export interface InjectedMismatch {
  readonly column: string;
  readonly injected: string;
  readonly found: string;
}

export type TabularFormat = 'spreadsheet' | 'delimited' | 'json';

export interface LoadOptions {
  /** Worksheet name for spreadsheets; the first sheet when omitted. */
  sheet?: string | null;
  /** Overrides the delimiter implied by the file extension. */
  delimiter?: string | null;
  skipBlankRows?: boolean;
  /** Constant columns added to every row, e.g. an experiment ID derived from the file path. */
  inject?: Readonly<Record<string, RawValue>>;
}

export function formatLocation(location: SourceLocation): string {
  const sheet = location.sheet ? `[${location.sheet}]` : '';
  return `${location.path}${sheet}:${location.row}`;
}
