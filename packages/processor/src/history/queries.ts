import type { Database } from '../db/index.js';
import { toRow, toRows } from '../db/types.js';
import type {
  EquityValueRow,
  ForexBalanceRow,
  SnapshotPositionRow,
  SnapshotRow,
  TradeDetailRow,
} from '../db/types.js';

export interface SnapshotHistoryInput {
  account_id?: string;
  from_date?: string;
  to_date?: string;
  limit?: number;
}

export interface SnapshotHistoryEntry extends SnapshotRow {
  equity_values: Pick<EquityValueRow, 'currency' | 'value'>[];
}

export interface ForexHistoryInput {
  account_id?: string;
  currency?: string;
  from_date?: string;
  to_date?: string;
}

export interface TradeDetailsInput {
  account_id?: string;
  from_date?: string;
  to_date?: string;
}

interface Filter {
  where: string;
  params: (string | number)[];
}

function buildFilter(clauses: [column: string, op: string, value: string | undefined][]): Filter {
  const conditions: string[] = [];
  const params: string[] = [];
  for (const [column, op, value] of clauses) {
    if (value) { conditions.push(`${column} ${op} ?`); params.push(value); }
  }
  return { where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '', params };
}

/** Snapshots newest first, each with its per-currency equity value. */
export function getSnapshotHistory(db: Database, input: SnapshotHistoryInput = {}): SnapshotHistoryEntry[] {
  const { account_id, from_date, to_date, limit = 100 } = input;
  const { where, params } = buildFilter([
    ['account_id', '=', account_id],
    ['as_of_date', '>=', from_date],
    ['as_of_date', '<=', to_date],
  ]);

  const snapshots = toRows<SnapshotRow>(
    db.prepare(
      `SELECT * FROM portfolio_snapshots ${where} ORDER BY as_of_date DESC, account_id LIMIT ?`
    ).all(...params, Math.max(1, limit))
  );

  const equity = db.prepare(
    'SELECT currency, value FROM equity_values WHERE account_id = ? AND as_of_date = ? ORDER BY currency'
  );
  return snapshots.map((snapshot) => ({
    ...snapshot,
    equity_values: toRows<Pick<EquityValueRow, 'currency' | 'value'>>(
      equity.all(snapshot.account_id, snapshot.as_of_date)
    ),
  }));
}

export function getForexHistory(db: Database, input: ForexHistoryInput = {}): ForexBalanceRow[] {
  const { where, params } = buildFilter([
    ['account_id', '=', input.account_id],
    ['currency', '=', input.currency?.toUpperCase()],
    ['as_of_date', '>=', input.from_date],
    ['as_of_date', '<=', input.to_date],
  ]);
  return toRows<ForexBalanceRow>(
    db.prepare(`SELECT * FROM forex_balances ${where} ORDER BY as_of_date DESC, account_id, currency`).all(...params)
  );
}

export function getSnapshotPositions(db: Database, account_id: string, as_of_date: string): SnapshotPositionRow[] {
  return toRows<SnapshotPositionRow>(
    db.prepare(
      'SELECT * FROM snapshot_positions WHERE account_id = ? AND as_of_date = ? ORDER BY instrument_id'
    ).all(account_id, as_of_date)
  );
}

export function getTradeDetails(db: Database, input: TradeDetailsInput = {}): TradeDetailRow[] {
  const { where, params } = buildFilter([
    ['account_id', '=', input.account_id],
    ['trade_date', '>=', input.from_date],
    ['trade_date', '<=', input.to_date],
  ]);
  return toRows<TradeDetailRow>(
    db.prepare(
      `SELECT * FROM trade_details ${where} ORDER BY trade_date, account_id, instrument_id, sequence`
    ).all(...params)
  );
}

export interface SnapshotDate {
  as_of_date: string;
  accounts: number;
}

/** Every date that has at least one snapshot, oldest first. */
export function getSnapshotDates(db: Database): SnapshotDate[] {
  return toRows<SnapshotDate>(
    db.prepare(
      'SELECT as_of_date, COUNT(*) AS accounts FROM portfolio_snapshots GROUP BY as_of_date ORDER BY as_of_date'
    ).all()
  );
}

export function getSnapshot(db: Database, account_id: string, as_of_date: string): SnapshotRow | undefined {
  return toRow<SnapshotRow | undefined>(
    db.prepare('SELECT * FROM portfolio_snapshots WHERE account_id = ? AND as_of_date = ?').get(account_id, as_of_date)
  );
}
