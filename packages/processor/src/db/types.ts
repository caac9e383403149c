// TypeScript row interfaces matching the SQLite schema

export interface SnapshotRow {
  account_id: string;
  as_of_date: string;
  base_currency: string;
  options_credit: number;
  options_debit: number;
  option_balance: number;
  open_short_options: number;
  warning_count: number;
  source: string | null;
  ingested_at: string;
}

export interface SnapshotPositionRow {
  account_id: string;
  as_of_date: string;
  instrument_id: string;
  asset_class: string;
  quantity: number;
  prior_quantity: number | null;
  cost_basis: number | null;
  mark_price: number;
  prior_price: number | null;
  pl_delta: number | null;
  currency: string;
  multiplier: number;
  source: string;
  underlying: string | null;
  strike: number | null;
  expiry: string | null;
  option_right: string | null;
  side: string | null;
  premium_received: number | null;
  premium_paid: number | null;
  premium_source: string | null;
}

export interface ForexBalanceRow {
  account_id: string;
  as_of_date: string;
  currency: string;
  balance: number;
  prior_balance: number | null;
  exchange_rate: number | null;
}

export interface EquityValueRow {
  account_id: string;
  as_of_date: string;
  currency: string;
  value: number;
}

export interface TradeDetailRow {
  account_id: string;
  trade_date: string;
  instrument_id: string;
  sequence: number;
  asset_class: string;
  action: string;
  open_close: string;
  quantity: number;
  price: number;
  proceeds: number;
  commission: number;
  currency: string;
  statement_date: string;
}

/**
 * Cast a better-sqlite3 row result to a typed row interface.
 * Statements return `unknown` rows at runtime; this bridges that
 * dynamically-typed boundary to our static TypeScript interfaces.
 */
export function toRow<T>(row: unknown): T {
  return row as T;
}

export function toRows<T>(rows: unknown[]): T[] {
  return rows.map((row) => toRow<T>(row));
}
