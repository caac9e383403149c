import type { Database } from './index.js';

/**
 * Each migration is keyed by its target user_version.
 * Migrations run in order from current+1 up to the latest version.
 */
const MIGRATIONS: Record<number, (db: Database) => void> = {
  1: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS portfolio_snapshots (
        account_id         TEXT NOT NULL,
        as_of_date         TEXT NOT NULL,
        base_currency      TEXT NOT NULL,
        options_credit     REAL NOT NULL,
        options_debit      REAL NOT NULL,
        option_balance     REAL NOT NULL DEFAULT 0,
        open_short_options INTEGER NOT NULL,
        warning_count      INTEGER NOT NULL DEFAULT 0,
        source             TEXT,
        ingested_at        TEXT NOT NULL,
        PRIMARY KEY (account_id, as_of_date)
      )
    `);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_snapshot_date ON portfolio_snapshots(as_of_date)`);

    db.exec(`
      CREATE TABLE IF NOT EXISTS snapshot_positions (
        account_id         TEXT NOT NULL,
        as_of_date         TEXT NOT NULL,
        instrument_id      TEXT NOT NULL,
        asset_class        TEXT NOT NULL,
        quantity           REAL NOT NULL,
        prior_quantity     REAL,
        cost_basis         REAL,
        mark_price         REAL NOT NULL,
        prior_price        REAL,
        pl_delta           REAL,
        currency           TEXT NOT NULL,
        multiplier         REAL NOT NULL,
        source             TEXT NOT NULL,
        underlying         TEXT,
        strike             REAL,
        expiry             TEXT,
        option_right       TEXT,
        side               TEXT,
        premium_received   REAL,
        premium_paid       REAL,
        premium_source     TEXT,
        PRIMARY KEY (account_id, as_of_date, instrument_id),
        FOREIGN KEY (account_id, as_of_date)
          REFERENCES portfolio_snapshots(account_id, as_of_date) ON DELETE CASCADE
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS forex_balances (
        account_id    TEXT NOT NULL,
        as_of_date    TEXT NOT NULL,
        currency      TEXT NOT NULL,
        balance       REAL NOT NULL,
        prior_balance REAL,
        exchange_rate REAL,
        PRIMARY KEY (account_id, as_of_date, currency),
        FOREIGN KEY (account_id, as_of_date)
          REFERENCES portfolio_snapshots(account_id, as_of_date) ON DELETE CASCADE
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS equity_values (
        account_id TEXT NOT NULL,
        as_of_date TEXT NOT NULL,
        currency   TEXT NOT NULL,
        value      REAL NOT NULL,
        PRIMARY KEY (account_id, as_of_date, currency),
        FOREIGN KEY (account_id, as_of_date)
          REFERENCES portfolio_snapshots(account_id, as_of_date) ON DELETE CASCADE
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS trade_details (
        account_id     TEXT NOT NULL,
        trade_date     TEXT NOT NULL,
        instrument_id  TEXT NOT NULL,
        sequence       INTEGER NOT NULL,
        asset_class    TEXT NOT NULL,
        action         TEXT NOT NULL,
        open_close     TEXT NOT NULL,
        quantity       REAL NOT NULL,
        price          REAL NOT NULL,
        proceeds       REAL NOT NULL,
        commission     REAL NOT NULL,
        currency       TEXT NOT NULL,
        statement_date TEXT NOT NULL,
        PRIMARY KEY (account_id, trade_date, instrument_id, sequence)
      )
    `);
    db.exec(`CREATE INDEX IF NOT EXISTS idx_trade_date ON trade_details(trade_date)`);
  },
};

export const LATEST_VERSION = Math.max(...Object.keys(MIGRATIONS).map(Number));

export function runMigrations(db: Database): void {
  db.pragma('foreign_keys = ON');

  const currentVersion = db.pragma('user_version', { simple: true });
  const version = typeof currentVersion === 'number' ? currentVersion : 0;

  if (version >= LATEST_VERSION) {
    return;
  }

  for (let v = version + 1; v <= LATEST_VERSION; v++) {
    const migration = MIGRATIONS[v];
    if (!migration) continue;

    db.exec('BEGIN');
    try {
      migration(db);
      db.pragma(`user_version = ${v}`);
      db.exec('COMMIT');
    } catch (err) {
      db.exec('ROLLBACK');
      throw err;
    }
  }
}
