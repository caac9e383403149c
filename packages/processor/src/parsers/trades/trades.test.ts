import { describe, it, expect } from 'vitest';
import { CONTEXT, TRADES_HEADER, tokenizedSection } from '../../test-support/index.js';
import { TradesParser, openClose, tradeAction, tradeCodes } from './index.js';

const parser = new TradesParser();

describe('trade codes', () => {
  it('splits codes on separators', () => {
    expect(tradeCodes('O;P')).toEqual(['O', 'P']);
    expect(tradeCodes(' C, Ep ')).toEqual(['C', 'Ep']);
    expect(tradeCodes(undefined)).toEqual([]);
  });

  it('derives the action from codes, then from the quantity sign', () => {
    expect(tradeAction(1, ['C', 'Ep'])).toBe('expiration');
    expect(tradeAction(100, ['A', 'O'])).toBe('assignment');
    expect(tradeAction(-100, ['Ex', 'C'])).toBe('exercise');
    expect(tradeAction(-1, ['O'])).toBe('sell');
    expect(tradeAction(1, [])).toBe('buy');
  });

  it('reads opening and closing flags', () => {
    expect(openClose(['O', 'P'])).toBe('open');
    expect(openClose(['C'])).toBe('close');
    expect(openClose(['P'])).toBe('unknown');
  });
});

describe('TradesParser', () => {
  it('parses stock and option executions', () => {
    const section = tokenizedSection('Trades', TRADES_HEADER, [
      ['Order', 'Stocks', 'USD', 'AAPL', '2025-01-16, 10:30:00', 10, 230.1, -2301, -1, 'O'],
      ['Order', 'Equity and Index Options', 'USD', 'ASTS 07FEB25 26 C', '2025-01-16, 10:31:00', -1, 2.5, 250, -1.05, 'O;P'],
    ]);
    const { records, warnings } = parser.parse(section, CONTEXT);

    expect(warnings).toEqual([]);
    expect(records[0]).toMatchObject({
      kind: 'trade',
      accountId: 'U1234567',
      instrument: { id: 'AAPL', assetClass: 'equity' },
      action: 'buy',
      openClose: 'open',
      quantity: 10,
      price: 230.1,
      currency: 'USD',
      tradeDate: '2025-01-16',
      proceeds: -2301,
      commission: -1,
      lineNumber: 2,
    });
    expect(records[1]).toMatchObject({
      instrument: { id: 'ASTS 07FEB25 26 C', assetClass: 'option' },
      action: 'sell',
      quantity: -1,
      proceeds: 250,
      commission: -1.05,
    });
  });

  it('computes missing proceeds from quantity, price and multiplier', () => {
    const section = tokenizedSection('Trades', TRADES_HEADER, [
      ['Order', 'Equity and Index Options', 'USD', 'SPY 21FEB25 580 P', '20250116', -2, 1.5, '', '', 'O'],
      ['Order', 'Stocks', 'USD', 'AAPL', '20250116', 10, 200, '', '', ''],
    ]);
    const { records } = parser.parse(section, CONTEXT);

    expect(records.map((r) => [r.proceeds, r.commission])).toEqual([[300, 0], [-2000, 0]]);
  });

  it('turns unusable lines into warnings, one per line', () => {
    const section = tokenizedSection('Trades', TRADES_HEADER, [
      ['Order', 'Stocks', 'USD', 'AAPL', '2025-01-16', 10, 230.1, -2301, -1, 'O'],
      ['ClosedLot', 'Stocks', 'USD', 'AAPL', '2025-01-10', 5, 200, '', '', ''],
      ['Order', 'Stocks', 'USD', 'MSFT', 'not a date', 1, 400, -400, 0, ''],
      ['Order', 'Stocks', 'USD', '', '2025-01-16', 1, 400, -400, 0, ''],
      ['Order', 'Stocks', 'USD', 'MSFT', '2025-01-16', 'ten', 400, -400, 0, ''],
      ['Order', 'Equity and Index Options', 'USD', 'SPY 21FEB25 580 P', '2025-01-17', 1, 0, 0, 0, 'C;Ep'],
    ]);
    const { records, warnings } = parser.parse(section, CONTEXT);

    expect(records.length + warnings.length).toBe(section.lines.length);
    expect(records.map((r) => [r.instrument.id, r.action])).toEqual([
      ['AAPL', 'buy'],
      ['SPY 21FEB25 580 P', 'expiration'],
    ]);
    expect(warnings.map((w) => [w.reason, w.field, w.line_number])).toEqual([
      ['lot_detail', 'DataDiscriminator', 3],
      ['invalid_date', 'Date/Time', 4],
      ['missing_field', 'Symbol', 5],
      ['invalid_number', 'Quantity', 6],
    ]);
    expect(warnings[1]).toMatchObject({
      type: 'field',
      value: 'not a date',
      section_index: 0,
      section_kind: 'trades',
    });
  });

  it('upper-cases the currency and defaults it to the base currency', () => {
    const section = tokenizedSection('Trades', TRADES_HEADER, [
      ['Order', 'Stocks', 'usd', 'AAPL', '2025-01-16', 1, 230, -230, 0, ''],
      ['Order', 'Stocks', '', 'AAPL', '2025-01-16', 1, 230, -230, 0, ''],
    ]);
    const { records } = parser.parse(section, CONTEXT);
    expect(records.map((r) => r.currency)).toEqual(['USD', 'USD']);
  });

  it('takes the account from an Account column when present', () => {
    const section = tokenizedSection('Trades', ['Account', ...TRADES_HEADER], [
      ['U7654321', 'Order', 'Stocks', 'USD', 'AAPL', '2025-01-16', 1, 230, -230, 0, ''],
      ['', 'Order', 'Stocks', 'USD', 'AAPL', '2025-01-16', 1, 230, -230, 0, ''],
    ]);
    const { records } = parser.parse(section, CONTEXT);
    expect(records.map((r) => r.accountId)).toEqual(['U7654321', 'U1234567']);
  });

  it('keeps trades of unrecognized instruments with their classification issue', () => {
    const section = tokenizedSection('Trades', TRADES_HEADER, [
      ['Order', 'Futures', 'USD', 'ESH5', '2025-01-16', 1, 6000, -300000, -2, 'O'],
    ]);
    const { records } = parser.parse(section, CONTEXT);
    expect(records[0]?.instrument.assetClass).toBe('unclassified');
    expect(records[0]?.classificationIssue?.reason).toBe('unclassified_instrument');
  });
});
