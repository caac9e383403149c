import { describe, it, expect } from 'vitest';
import { ColumnIndex, FieldError, RowReader, coerceDate, coerceNumber, field } from './fields.js';

describe('coerceNumber', () => {
  it.each([
    ['1,234.50', 1234.5],
    ['(250.00)', -250],
    ['1,234.50 USD', 1234.5],
    ['USD 10', 10],
    ['$1,234.50', 1234.5],
    ['-$12', -12],
    ['-0.5', -0.5],
    ['1e3', 1000],
  ])('reads %s', (raw, expected) => {
    expect(coerceNumber(raw)).toEqual({ ok: true, value: expected });
  });

  it.each(['', '  ', '-', '--', 'n/a'])('treats %j as absent', (raw) => {
    expect(coerceNumber(raw)).toEqual({ ok: true, value: undefined });
  });

  it('rejects text', () => {
    expect(coerceNumber('abc')).toEqual({ ok: false, error: '"abc" is not a number' });
  });
});

describe('coerceDate', () => {
  it.each([
    ['2025-01-16', '2025-01-16'],
    ['2025-01-16, 10:30:00', '2025-01-16'],
    ['2025-01-16 10:30:00', '2025-01-16'],
    ['20250116', '2025-01-16'],
    ['16JAN25', '2025-01-16'],
    ['01/16/2025', '2025-01-16'],
  ])('reads %s', (raw, expected) => {
    expect(coerceDate(raw)).toEqual({ ok: true, value: expected });
  });

  it('returns undefined for a blank value', () => {
    expect(coerceDate('')).toEqual({ ok: true, value: undefined });
  });

  it('rejects values no format accepts', () => {
    const result = coerceDate('2025-13-45');
    expect(result.ok).toBe(false);
  });

  it('only tries the formats it is given', () => {
    expect(coerceDate('2025-01-16', ['MM/dd/yyyy']).ok).toBe(false);
  });
});

describe('RowReader', () => {
  const columns = new ColumnIndex(['Symbol', 'Quantity', 'Date/Time']);
  const SYMBOL = field('symbol');
  const QUANTITY = field('Quantity', 'Position');
  const DATE = field('Date/Time');
  const MISSING = field('Cost Basis');

  function reader(...values: string[]) {
    return new RowReader(columns, { lineNumber: 3, sectionName: 'Trades', discriminator: 'Data', values });
  }

  it('finds columns case-insensitively', () => {
    expect(columns.has(SYMBOL)).toBe(true);
    expect(reader('AAPL', '10', '2025-01-16').text(SYMBOL)).toBe('AAPL');
  });

  it('finds columns by alias', () => {
    expect(new ColumnIndex(['Position']).find(QUANTITY)).toBe(0);
  });

  it('reads missing trailing values and absent columns as undefined', () => {
    const row = reader('AAPL');
    expect(row.number(QUANTITY)).toBeUndefined();
    expect(row.text(MISSING)).toBeUndefined();
  });

  it('throws a FieldError for an empty required value', () => {
    const row = reader('AAPL');
    expect(() => row.requireNumber(QUANTITY)).toThrow(FieldError);
    expect(() => row.requireNumber(QUANTITY)).toThrow('Quantity is empty');
  });

  it('reports invalid numbers and dates with the offending value', () => {
    const row = reader('AAPL', 'ten', 'yesterday');
    try {
      row.number(QUANTITY);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(FieldError);
      expect(e).toMatchObject({ reason: 'invalid_number', field: 'Quantity', value: 'ten' });
    }
    expect(() => row.requireDate(DATE)).toThrow(/^Date\/Time: "yesterday" matches none of/);
  });
});
