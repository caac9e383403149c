import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, DEFAULT_DB_PATH, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('returns the defaults with an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.dbPath).toBe(DEFAULT_DB_PATH);
  });

  it('reads STATEMENT_* variables and coerces their types', () => {
    const config = loadConfig({
      STATEMENT_DB_PATH: '/tmp/ledger-test.db',
      STATEMENT_BASE_CURRENCY: 'EUR',
      STATEMENT_FOREX_TOLERANCE: '0.5',
      STATEMENT_CONSOLIDATE_ACCOUNTS: 'true',
      STATEMENT_OPTION_MULTIPLIER: '10',
      STATEMENT_LOG_LEVEL: 'debug',
    });
    expect(config).toEqual({
      dbPath: '/tmp/ledger-test.db',
      baseCurrency: 'EUR',
      forexTolerance: 0.5,
      consolidateAccounts: true,
      optionMultiplier: 10,
      logLevel: 'debug',
    });
  });

  it('treats "0" as false and ignores blank variables', () => {
    const config = loadConfig({ STATEMENT_CONSOLIDATE_ACCOUNTS: '0', STATEMENT_BASE_CURRENCY: '' });
    expect(config.consolidateAccounts).toBe(false);
    expect(config.baseCurrency).toBe('USD');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ STATEMENT_DB_PATH: '/tmp/a.db' }, { dbPath: ':memory:' });
    expect(config.dbPath).toBe(':memory:');
  });

  it('lists every invalid key', () => {
    expect(() =>
      loadConfig({ STATEMENT_BASE_CURRENCY: 'usd', STATEMENT_FOREX_TOLERANCE: '-1' })
    ).toThrow(/^Invalid configuration: baseCurrency: must be a three-letter currency code; forexTolerance: /);
  });
});
