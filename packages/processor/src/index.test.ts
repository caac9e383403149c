import { describe, it, expect, afterEach } from 'vitest';
import { openLedger, resetDb } from './index.js';
import { ACTIVITY_STATEMENT, readFixture, statementDocument } from './test-support/index.js';

describe('openLedger', () => {
  afterEach(() => {
    resetDb();
  });

  it('binds processing and queries to one database', () => {
    const ledger = openLedger({ dbPath: ':memory:', logLevel: 'silent' }, {});

    const summary = ledger.process(statementDocument(readFixture(ACTIVITY_STATEMENT)));

    expect(summary.status).toBe('success');
    expect(ledger.dates()).toEqual([{ as_of_date: '2025-01-16', accounts: 1 }]);
    expect(ledger.snapshotHistory({ account_id: 'U1234567' })[0]?.options_credit).toBe(300);
    expect(ledger.forexHistory({ currency: 'usd' }).map((r) => r.balance)).toEqual([9915.55]);
    expect(ledger.positions('U1234567', '2025-01-16')).toHaveLength(4);
    expect(ledger.trades({ account_id: 'U1234567' })).toHaveLength(5);
  });

  it('reads settings from the environment', () => {
    const ledger = openLedger(
      { dbPath: ':memory:' },
      { STATEMENT_BASE_CURRENCY: 'EUR', STATEMENT_LOG_LEVEL: 'silent' },
    );
    expect(ledger.config.baseCurrency).toBe('EUR');
    expect(ledger.config.logLevel).toBe('silent');
  });

  it('handles raw requests', () => {
    const ledger = openLedger({ dbPath: ':memory:', logLevel: 'silent' }, {});
    const response = ledger.handle({ csv_content: readFixture(ACTIVITY_STATEMENT), subject: 'Daily Activity 01/16/2025' });
    expect(response.status).toBe('success');
  });

  it('closes the database', () => {
    const ledger = openLedger({ dbPath: ':memory:', logLevel: 'silent' }, {});
    ledger.close();
    expect(ledger.db.open).toBe(false);
  });
});
