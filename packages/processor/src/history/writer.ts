import type { Database } from '../db/index.js';
import { PersistenceError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { isOptionPosition } from '../statement/types.js';
import type { PortfolioSnapshot, SnapshotPosition, TradeRecord } from '../statement/types.js';

export interface WriteOptions {
  /** Stored as the snapshot's ingestion time; taken from the document, never the clock. */
  ingestedAt: string;
  /** Statement date recorded against each trade row. */
  statementDate: string;
  /** File name or mail subject the snapshot came from. */
  source?: string;
  logger?: Logger;
}

export interface WriteResult {
  snapshotsInserted: number;
  snapshotsOverwritten: number;
  /** Snapshot, position, forex balance and equity value rows. */
  rowsWritten: number;
  tradesAppended: number;
  tradesSkipped: number;
}

export function emptyWriteResult(): WriteResult {
  return { snapshotsInserted: 0, snapshotsOverwritten: 0, rowsWritten: 0, tradesAppended: 0, tradesSkipped: 0 };
}

function positionParams(snapshot: PortfolioSnapshot, position: SnapshotPosition) {
  const option = isOptionPosition(position) ? position : undefined;
  return {
    account_id: snapshot.accountId,
    as_of_date: snapshot.asOfDate,
    instrument_id: position.instrument.id,
    asset_class: position.instrument.assetClass,
    quantity: position.quantity,
    prior_quantity: position.priorQuantity ?? null,
    cost_basis: position.costBasis ?? null,
    mark_price: position.markPrice,
    prior_price: position.priorPrice ?? null,
    pl_delta: position.plDelta ?? null,
    currency: position.currency,
    multiplier: position.multiplier,
    source: position.source,
    underlying: option?.underlying ?? null,
    strike: option?.strike ?? null,
    expiry: option?.expiry ?? null,
    option_right: option?.right ?? null,
    side: option?.side ?? null,
    premium_received: option?.premiumReceived.amount ?? null,
    premium_paid: option?.premiumPaidToClose.amount ?? null,
    premium_source: option?.premiumSource ?? null,
  };
}

/**
 * Persist snapshots and their trade detail in one transaction.
 *
 * Snapshots are keyed by (account_id, as_of_date): a second write for the
 * same key replaces the snapshot row and all of its child rows. Trades are
 * append-only, keyed by (account_id, trade_date, instrument_id, sequence)
 * where sequence is the trade's 1-based position among trades of that
 * instrument on that date, in document order.
 */
export function writeSnapshots(
  db: Database,
  snapshots: readonly PortfolioSnapshot[],
  trades: readonly TradeRecord[],
  options: WriteOptions,
): WriteResult {
  const logger = options.logger ?? silentLogger;
  const result = emptyWriteResult();
  const overwritten: PortfolioSnapshot[] = [];

  try {
    db.exec('BEGIN IMMEDIATE');

    const exists = db.prepare('SELECT 1 FROM portfolio_snapshots WHERE account_id = ? AND as_of_date = ?');
    const upsertSnapshot = db.prepare(
      `INSERT INTO portfolio_snapshots
       (account_id, as_of_date, base_currency, options_credit, options_debit, option_balance, open_short_options, warning_count, source, ingested_at)
       VALUES (@account_id, @as_of_date, @base_currency, @options_credit, @options_debit, @option_balance, @open_short_options, @warning_count, @source, @ingested_at)
       ON CONFLICT(account_id, as_of_date) DO UPDATE SET
         base_currency = excluded.base_currency,
         options_credit = excluded.options_credit,
         options_debit = excluded.options_debit,
         option_balance = excluded.option_balance,
         open_short_options = excluded.open_short_options,
         warning_count = excluded.warning_count,
         source = excluded.source,
         ingested_at = excluded.ingested_at`
    );
    const clearChildren = [
      db.prepare('DELETE FROM snapshot_positions WHERE account_id = ? AND as_of_date = ?'),
      db.prepare('DELETE FROM forex_balances WHERE account_id = ? AND as_of_date = ?'),
      db.prepare('DELETE FROM equity_values WHERE account_id = ? AND as_of_date = ?'),
    ];
    const insertPosition = db.prepare(
      `INSERT INTO snapshot_positions
       (account_id, as_of_date, instrument_id, asset_class, quantity, prior_quantity, cost_basis, mark_price,
        prior_price, pl_delta, currency, multiplier, source, underlying, strike, expiry, option_right, side,
        premium_received, premium_paid, premium_source)
       VALUES (@account_id, @as_of_date, @instrument_id, @asset_class, @quantity, @prior_quantity, @cost_basis, @mark_price,
        @prior_price, @pl_delta, @currency, @multiplier, @source, @underlying, @strike, @expiry, @option_right, @side,
        @premium_received, @premium_paid, @premium_source)`
    );
    const insertForex = db.prepare(
      `INSERT INTO forex_balances (account_id, as_of_date, currency, balance, prior_balance, exchange_rate)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    const insertEquity = db.prepare(
      'INSERT INTO equity_values (account_id, as_of_date, currency, value) VALUES (?, ?, ?, ?)'
    );
    const insertTrade = db.prepare(
      `INSERT OR IGNORE INTO trade_details
       (account_id, trade_date, instrument_id, sequence, asset_class, action, open_close, quantity, price,
        proceeds, commission, currency, statement_date)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    for (const snapshot of snapshots) {
      const key = [snapshot.accountId, snapshot.asOfDate] as const;
      if (exists.get(...key)) {
        result.snapshotsOverwritten++;
        overwritten.push(snapshot);
      } else {
        result.snapshotsInserted++;
      }

      upsertSnapshot.run({
        account_id: snapshot.accountId,
        as_of_date: snapshot.asOfDate,
        base_currency: snapshot.baseCurrency,
        options_credit: snapshot.optionsCredit.amount,
        options_debit: snapshot.optionsDebit.amount,
        option_balance: snapshot.optionBalance.amount,
        open_short_options: snapshot.openShortOptions,
        warning_count: snapshot.warningCount,
        source: options.source ?? null,
        ingested_at: options.ingestedAt,
      });
      result.rowsWritten++;

      for (const statement of clearChildren) statement.run(...key);

      for (const position of snapshot.positions) {
        insertPosition.run(positionParams(snapshot, position));
        result.rowsWritten++;
      }
      for (const balance of snapshot.forexBalances) {
        insertForex.run(
          ...key,
          balance.currency,
          balance.balance.amount,
          balance.priorBalance?.amount ?? null,
          balance.exchangeRate ?? null,
        );
        result.rowsWritten++;
      }
      for (const value of snapshot.equityValue) {
        insertEquity.run(...key, value.currency, value.amount);
        result.rowsWritten++;
      }
    }

    const sequences = new Map<string, number>();
    for (const trade of trades) {
      const tradeKey = `${trade.accountId}|${trade.tradeDate}|${trade.instrument.id}`;
      const sequence = (sequences.get(tradeKey) ?? 0) + 1;
      sequences.set(tradeKey, sequence);

      const { changes } = insertTrade.run(
        trade.accountId, trade.tradeDate, trade.instrument.id, sequence,
        trade.instrument.assetClass, trade.action, trade.openClose, trade.quantity, trade.price,
        trade.proceeds, trade.commission, trade.currency, options.statementDate,
      );
      if (changes > 0) result.tradesAppended++;
      else result.tradesSkipped++;
    }

    db.exec('COMMIT');
  } catch (err) {
    if (db.inTransaction) db.exec('ROLLBACK');
    throw new PersistenceError(`Snapshot write failed: ${describeError(err)}`, { cause: err });
  }

  for (const snapshot of overwritten) {
    logger.info('snapshot overwritten', { account_id: snapshot.accountId, as_of_date: snapshot.asOfDate });
  }

  return result;
}
