import { format, isValid, parse } from 'date-fns';
import type { FieldWarningReason } from '../errors.js';
import type { StatementLine } from './types.js';

/**
 * Date formats tried in order. The first one that consumes the whole value
 * wins; a value none of them accepts is a field-level warning.
 */
export const DATE_FORMATS = [
  'yyyy-MM-dd',               // 2025-01-16
  'yyyy-MM-dd, HH:mm:ss',     // 2025-01-16, 10:30:00 (trade Date/Time)
  'yyyy-MM-dd HH:mm:ss',      // 2025-01-16 10:30:00
  'yyyyMMdd',                 // 20250116
  'ddMMMyy',                  // 16JAN25 (option expiries)
  'MM/dd/yyyy',               // 01/16/2025
] as const;

// Two-digit years resolve into 1950–2049.
const REFERENCE_DATE = new Date(2000, 0, 1);

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;
const EMPTY_NUMBERS = new Set(['', '-', '--', 'n/a', 'N/A']);

export type Coerced<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Parse a statement number. Accepts thousands separators, parenthesized
 * negatives and a leading or trailing currency code or symbol
 * (`(1,234.50)`, `1,234.50 USD`, `-$12`). Blank values coerce to undefined.
 */
export function coerceNumber(raw: string | undefined): Coerced<number | undefined> {
  const trimmed = (raw ?? '').trim();
  if (EMPTY_NUMBERS.has(trimmed)) return { ok: true, value: undefined };

  let s = trimmed;
  let negative = false;

  const paren = /^\((.*)\)$/.exec(s);
  if (paren) {
    negative = true;
    s = (paren[1] ?? '').trim();
  }

  s = s
    .replace(/^[A-Z]{3}\s+/, '')
    .replace(/\s*[A-Z]{3}$/, '')
    .replace(/^([-+]?)[$€£¥]/, '$1')
    .replace(/,/g, '')
    .replace(/\s+/g, '');

  if (!NUMERIC.test(s)) {
    return { ok: false, error: `"${trimmed}" is not a number` };
  }

  const value = Number(s);
  return { ok: true, value: negative ? -Math.abs(value) : value };
}

export function coerceDate(
  raw: string | undefined,
  formats: readonly string[] = DATE_FORMATS,
): Coerced<string | undefined> {
  const trimmed = (raw ?? '').trim();
  if (trimmed === '') return { ok: true, value: undefined };

  for (const fmt of formats) {
    const parsed = parse(trimmed, fmt, REFERENCE_DATE);
    if (isValid(parsed)) return { ok: true, value: format(parsed, 'yyyy-MM-dd') };
  }

  return { ok: false, error: `"${trimmed}" matches none of: ${formats.join(', ')}` };
}

// ─── Column access ────────────────────────────────────────────────────────────

/** A named column, with the alternative headings it appears under. */
export interface Field {
  label: string;
  aliases?: string[];
}

export function field(label: string, ...aliases: string[]): Field {
  return { label, aliases };
}

function normaliseHeading(heading: string): string {
  return heading.trim().toLowerCase().replace(/\s+/g, ' ');
}

export class ColumnIndex {
  private readonly positions = new Map<string, number>();

  constructor(header: readonly string[]) {
    header.forEach((heading, i) => {
      const key = normaliseHeading(heading);
      if (key && !this.positions.has(key)) this.positions.set(key, i);
    });
  }

  find(f: Field): number | undefined {
    for (const candidate of [f.label, ...(f.aliases ?? [])]) {
      const position = this.positions.get(normaliseHeading(candidate));
      if (position !== undefined) return position;
    }
    return undefined;
  }

  has(f: Field): boolean {
    return this.find(f) !== undefined;
  }
}

/**
 * Thrown while reading a single line; the section parser turns it into a
 * FieldWarning and moves on to the next line.
 */
export class FieldError extends Error {
  constructor(
    readonly reason: FieldWarningReason,
    message: string,
    readonly field?: string,
    readonly value?: string,
  ) {
    super(message);
    this.name = 'FieldError';
  }
}

/**
 * Typed access to one line's values by column name. Short rows read as blank
 * for missing trailing columns.
 */
export class RowReader {
  constructor(
    private readonly columns: ColumnIndex,
    readonly line: StatementLine,
  ) {}

  text(f: Field): string | undefined {
    const position = this.columns.find(f);
    if (position === undefined) return undefined;
    const value = (this.line.values[position] ?? '').trim();
    return value === '' ? undefined : value;
  }

  requireText(f: Field): string {
    const value = this.text(f);
    if (value === undefined) {
      throw new FieldError('missing_field', `${f.label} is empty`, f.label);
    }
    return value;
  }

  number(f: Field): number | undefined {
    const raw = this.text(f);
    const result = coerceNumber(raw);
    if (!result.ok) {
      throw new FieldError('invalid_number', `${f.label}: ${result.error}`, f.label, raw);
    }
    return result.value;
  }

  requireNumber(f: Field): number {
    const value = this.number(f);
    if (value === undefined) {
      throw new FieldError('missing_field', `${f.label} is empty`, f.label);
    }
    return value;
  }

  requireDate(f: Field): string {
    const raw = this.text(f);
    const result = coerceDate(raw);
    if (!result.ok) {
      throw new FieldError('invalid_date', `${f.label}: ${result.error}`, f.label, raw);
    }
    if (result.value === undefined) {
      throw new FieldError('missing_field', `${f.label} is empty`, f.label);
    }
    return result.value;
  }
}
