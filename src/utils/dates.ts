/**
 * strftime-style date formats (as written in schema descriptors) mapped onto date-fns.
 */

import { format as formatDate, isValid, parse } from 'date-fns';

const DIRECTIVES: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  H: 'HH',
  I: 'hh',
  M: 'mm',
  S: 'ss',
  p: 'a',
  b: 'MMM',
  B: 'MMMM',
  a: 'EEE',
  A: 'EEEE',
  j: 'DDD',
};

export class DateFormatSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DateFormatSyntaxError';
  }
}

export interface CompiledDateFormat {
  readonly source: string;
  readonly tokens: string;
}

function quoteLiteral(text: string): string {
  if (!text) return '';
  if (!/[A-Za-z']/.test(text)) return text;
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Translate a strftime format (`%Y/%m/%d`) into a date-fns token string (`yyyy/MM/dd`).
 * Letters outside directives are quoted so date-fns treats them as literals.
 */
export function compileDateFormat(source: string): CompiledDateFormat {
  let tokens = '';
  let literal = '';
  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch !== '%') {
      literal += ch;
      continue;
    }
    const directive = source[i + 1];
    if (directive === undefined) {
      throw new DateFormatSyntaxError(`Dangling '%' at end of date format '${source}'`);
    }
    i += 1;
    if (directive === '%') {
      literal += '%';
      continue;
    }
    const token = DIRECTIVES[directive];
    if (token === undefined) {
      throw new DateFormatSyntaxError(`Unsupported directive '%${directive}' in date format '${source}'`);
    }
    tokens += quoteLiteral(literal) + token;
    literal = '';
  }
  tokens += quoteLiteral(literal);
  if (!tokens) {
    throw new DateFormatSyntaxError('Date format is empty');
  }
  return Object.freeze({ source, tokens });
}

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Parse `text` with a compiled format. Returns null when the text does not match.
 */
export function parseDate(text: string, compiled: CompiledDateFormat): Date | null {
  const parsed = parse(text.trim(), compiled.tokens, REFERENCE_DATE, {
    useAdditionalDayOfYearTokens: true,
  });
  return isValid(parsed) ? parsed : null;
}

export function formatDateValue(value: Date, compiled: CompiledDateFormat): string {
  return formatDate(value, compiled.tokens, { useAdditionalDayOfYearTokens: true });
}
