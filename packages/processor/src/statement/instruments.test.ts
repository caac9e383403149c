import { describe, it, expect } from 'vitest';
import { categoryClass, classifyInstrument, parseOptionSymbol } from './instruments.js';

describe('parseOptionSymbol', () => {
  it('reads underlying, expiry, strike and right', () => {
    expect(parseOptionSymbol('ASTS 07FEB25 26 C')).toEqual({
      underlying: 'ASTS',
      expiry: '2025-02-07',
      strike: 26,
      right: 'call',
    });
    expect(parseOptionSymbol('BRK B 17JAN25 400.5 P')).toEqual({
      underlying: 'BRK B',
      expiry: '2025-01-17',
      strike: 400.5,
      right: 'put',
    });
  });

  it('rejects symbols that are not options', () => {
    expect(parseOptionSymbol('AAPL')).toBeUndefined();
    expect(parseOptionSymbol('ASTS 31FEB25 26 C')).toBeUndefined();
  });
});

describe('categoryClass', () => {
  it('maps statement categories, ignoring case', () => {
    expect(categoryClass('Stocks')).toBe('equity');
    expect(categoryClass('Equity and Index Options')).toBe('option');
    expect(categoryClass('FOREX')).toBe('forex');
  });

  it('distinguishes untracked categories from unknown ones', () => {
    expect(categoryClass('Futures')).toBeNull();
    expect(categoryClass('Something Else')).toBeUndefined();
    expect(categoryClass('constructor')).toBeUndefined();
  });
});

describe('classifyInstrument', () => {
  it('classifies options by shape', () => {
    const { instrument, issue } = classifyInstrument('SPY 21FEB25 580 P', 'Equity and Index Options');
    expect(instrument.assetClass).toBe('option');
    expect(instrument.option?.strike).toBe(580);
    expect(issue).toBeUndefined();
  });

  it('classifies forex pairs and bare currencies under a forex category', () => {
    expect(classifyInstrument('EUR.USD', 'Forex').instrument).toEqual({
      id: 'EUR.USD',
      assetClass: 'forex',
      forex: { base: 'EUR', quote: 'USD' },
    });
    expect(classifyInstrument('EUR', 'Forex').instrument).toEqual({
      id: 'EUR',
      assetClass: 'forex',
      forex: { base: 'EUR' },
    });
  });

  it('classifies tickers as equities and collapses inner whitespace', () => {
    expect(classifyInstrument('AAPL', 'Stocks')).toEqual({ instrument: { id: 'AAPL', assetClass: 'equity' } });
    expect(classifyInstrument(' BRK   B ').instrument).toEqual({ id: 'BRK B', assetClass: 'equity' });
  });

  it('keeps the shape but reports a contradicting category', () => {
    const { instrument, issue } = classifyInstrument('AAPL', 'Forex');
    expect(instrument.assetClass).toBe('equity');
    expect(issue).toEqual({
      reason: 'category_mismatch',
      message: '"AAPL" looks like equity but is listed under "Forex"',
    });
  });

  it('marks untracked categories and unrecognized identifiers as unclassified', () => {
    expect(classifyInstrument('ESH5', 'Futures')).toEqual({
      instrument: { id: 'ESH5', assetClass: 'unclassified' },
      issue: { reason: 'unclassified_instrument', message: '"ESH5" is in untracked asset category "Futures"' },
    });
    expect(classifyInstrument('not/a/symbol').instrument.assetClass).toBe('unclassified');
  });
});
