import { describe, it, expect } from 'vitest';
import { tokenizedSection } from '../../test-support/index.js';
import { AccountInfoParser, accountDetails } from './index.js';

describe('AccountInfoParser', () => {
  const section = tokenizedSection('Account Information', ['Field Name', 'Field Value'], [
    ['Name', 'Test Holder'],
    ['Account', 'U1234567'],
    ['Base Currency', 'usd'],
    ['Account Type', 'Individual'],
    ['Master Name', ''],
  ]);
  const { records, warnings } = new AccountInfoParser().parse(section);

  it('reads field name/value pairs', () => {
    expect(records.map((r) => [r.field, r.value])).toEqual([
      ['Name', 'Test Holder'],
      ['Account', 'U1234567'],
      ['Base Currency', 'usd'],
      ['Account Type', 'Individual'],
    ]);
    expect(warnings.map((w) => [w.reason, w.message])).toEqual([['missing_field', 'Field Value is empty']]);
  });

  it('extracts the account id, base currency and holder name', () => {
    expect(accountDetails(records)).toEqual({ accountId: 'U1234567', baseCurrency: 'USD', name: 'Test Holder' });
  });

  it('keeps the first value when a field repeats', () => {
    const details = accountDetails([
      { kind: 'account_field', field: 'Account', value: 'U1', lineNumber: 1 },
      { kind: 'account_field', field: 'account', value: 'U2', lineNumber: 2 },
    ]);
    expect(details).toEqual({ accountId: 'U1' });
  });
});
