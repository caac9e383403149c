import type { ReconciliationWarning, ReconciliationWarningReason } from '../errors.js';
import {
  CurrencyLedger,
  addAmounts,
  amountOf,
  roundAmount,
  roundCents,
  subtractAmounts,
  sumAmounts,
  zero,
} from '../money.js';
import type { CurrencyAmount } from '../money.js';
import { ENDING_CASH, STARTING_CASH } from '../parsers/cash-forex/index.js';
import type {
  CashReportEntry,
  ForexBalance,
  OptionContract,
  OptionPosition,
  OptionSide,
  PortfolioSnapshot,
  PositionRecord,
  PremiumSource,
  SnapshotPosition,
  TradeRecord,
} from '../statement/types.js';

export interface ReconcileInput {
  /** The statement's account; the snapshot key when accounts are consolidated. */
  accountId: string;
  asOfDate: string;
  baseCurrency: string;
  trades: readonly TradeRecord[];
  positions: readonly PositionRecord[];
  forexBalances: readonly ForexBalance[];
  cashEntries: readonly CashReportEntry[];
}

export interface ReconcileOptions {
  /** Net every account in the run into one snapshot under `input.accountId`. */
  consolidateAccounts?: boolean;
  /** Largest forex cross-check difference tolerated without a warning. */
  forexTolerance?: number;
}

export interface ReconcileResult {
  snapshots: PortfolioSnapshot[];
  warnings: ReconciliationWarning[];
}

interface AccountRecords {
  accountId: string;
  trades: TradeRecord[];
  positions: PositionRecord[];
  forexBalances: ForexBalance[];
  cashEntries: CashReportEntry[];
}

const QUANTITY_EPSILON = 1e-9;

class WarningCollector {
  readonly warnings: ReconciliationWarning[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly accountId: string) {}

  add(
    reason: ReconciliationWarningReason,
    message: string,
    subject: { instrument_id?: string; currency?: string } = {},
  ): void {
    const key = `${reason}|${subject.instrument_id ?? ''}|${subject.currency ?? ''}`;
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.warnings.push({ type: 'reconciliation', reason, message, account_id: this.accountId, ...subject });
  }
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

function addOptional(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return a + b;
}

// ─── Positions ────────────────────────────────────────────────────────────────

function combinePositions(a: PositionRecord, b: PositionRecord): PositionRecord {
  return {
    ...a,
    quantity: a.quantity + b.quantity,
    priorQuantity: addOptional(a.priorQuantity, b.priorQuantity),
    costBasis: addOptional(a.costBasis, b.costBasis),
    plDelta: addOptional(a.plDelta, b.plDelta),
  };
}

/**
 * One position per instrument. Open Positions rows are authoritative for
 * quantity, cost basis and currency; the mark-to-market summary contributes
 * prior quantity, prior price and P/L, and is the only source for
 * instruments closed during the period.
 */
function mergePositions(
  records: readonly PositionRecord[],
  tradesByInstrument: Map<string, TradeRecord[]>,
  warnings: WarningCollector,
): PositionRecord[] {
  const held = new Map<string, PositionRecord>();
  const marked = new Map<string, PositionRecord>();

  for (const record of records) {
    const target = record.source === 'positions' ? held : marked;
    const existing = target.get(record.instrument.id);
    if (!existing) {
      target.set(record.instrument.id, record);
      continue;
    }
    if (existing.accountId === record.accountId) {
      warnings.add(
        'duplicate_record',
        `${record.instrument.id} appears more than once in ${record.source}; quantities were added`,
        { instrument_id: record.instrument.id },
      );
    }
    target.set(record.instrument.id, combinePositions(existing, record));
  }

  const ids = [...new Set([...held.keys(), ...marked.keys()])].sort();
  const merged: PositionRecord[] = [];

  for (const id of ids) {
    const position = held.get(id);
    const mtm = marked.get(id);

    if (position && mtm) {
      if (Math.abs(position.quantity - mtm.quantity) > QUANTITY_EPSILON) {
        warnings.add(
          'quantity_conflict',
          `${id}: Open Positions reports ${position.quantity}, mark-to-market summary reports ${mtm.quantity}`,
          { instrument_id: id },
        );
      }
      merged.push({
        ...position,
        priorQuantity: mtm.priorQuantity,
        priorPrice: mtm.priorPrice,
        plDelta: mtm.plDelta,
      });
    } else if (position) {
      merged.push(position);
    } else if (mtm) {
      // Summary amounts carry no currency; the instrument's own trades do.
      const traded = tradesByInstrument.get(id)?.[0];
      merged.push(traded ? { ...mtm, currency: traded.currency } : mtm);
    }
  }

  return merged;
}

// ─── Options ──────────────────────────────────────────────────────────────────

function optionSide(position: PositionRecord, openingSells: readonly TradeRecord[]): OptionSide {
  if (position.quantity !== 0) return position.quantity < 0 ? 'short' : 'long';
  const prior = position.priorQuantity ?? 0;
  if (prior !== 0) return prior < 0 ? 'short' : 'long';
  return openingSells.length > 0 ? 'short' : 'long';
}

interface Premium {
  received: CurrencyAmount;
  paidToClose: CurrencyAmount;
  source: PremiumSource;
}

/**
 * Premium for a short option, from the first source available:
 *   - the run's opening sells, less the run's closing buys, when the whole
 *     position was opened in this run (no prior quantity);
 *   - the cost basis, which covers every open contract however old;
 *   - the run's opening sells alone, reported as an estimate;
 *   - the current mark value, reported as an estimate.
 */
function shortPremium(
  position: PositionRecord,
  openingSells: readonly TradeRecord[],
  closingBuys: readonly TradeRecord[],
  warnings: WarningCollector,
): Premium {
  const currency = position.currency;
  const fromTrades = (): Premium => ({
    received: sumAmounts(currency, openingSells.map((t) => amountOf(t.currency, t.proceeds))),
    paidToClose: sumAmounts(currency, closingBuys.map((t) => amountOf(t.currency, -t.proceeds))),
    source: 'trades',
  });
  const heldBefore = (position.priorQuantity ?? 0) !== 0;

  if (openingSells.length > 0 && !heldBefore) {
    return fromTrades();
  }

  if (position.costBasis !== undefined) {
    return {
      received: amountOf(currency, Math.abs(position.costBasis)),
      paidToClose: zero(currency),
      source: 'cost_basis',
    };
  }

  if (openingSells.length > 0) {
    warnings.add(
      'premium_estimated',
      `${position.instrument.id}: held before this statement and no cost basis; premium counts only this statement's opening trades`,
      { instrument_id: position.instrument.id },
    );
    return fromTrades();
  }

  if (position.quantity !== 0) {
    warnings.add(
      'premium_estimated',
      `${position.instrument.id}: no opening trade or cost basis; premium estimated from the current mark`,
      { instrument_id: position.instrument.id },
    );
  }
  return {
    received: amountOf(currency, Math.abs(position.quantity * position.markPrice * position.multiplier)),
    paidToClose: zero(currency),
    source: 'mark',
  };
}

function toOptionPosition(
  position: PositionRecord,
  contract: OptionContract,
  trades: readonly TradeRecord[],
  warnings: WarningCollector,
): OptionPosition {
  const sameCurrency = trades.filter((t) => t.currency === position.currency);
  if (sameCurrency.length < trades.length) {
    warnings.add(
      'non_base_currency_option',
      `${position.instrument.id}: trades in a currency other than ${position.currency} were left out of its premium`,
      { instrument_id: position.instrument.id },
    );
  }

  const openingSells = sameCurrency.filter((t) => t.quantity < 0 && t.openClose !== 'close');
  const closingBuys = sameCurrency.filter((t) => t.quantity > 0 && t.openClose !== 'open');
  const side = optionSide(position, openingSells);

  const premium: Premium =
    side === 'short'
      ? shortPremium(position, openingSells, closingBuys, warnings)
      : { received: zero(position.currency), paidToClose: zero(position.currency), source: 'none' };

  return {
    ...position,
    underlying: contract.underlying,
    strike: contract.strike,
    expiry: contract.expiry,
    right: contract.right,
    side,
    premiumReceived: roundAmount(premium.received),
    premiumPaidToClose: roundAmount(premium.paidToClose),
    premiumSource: premium.source,
  };
}

// ─── Forex ────────────────────────────────────────────────────────────────────

function accumulate(target: Map<string, ForexBalance>, balance: ForexBalance): void {
  const existing = target.get(balance.currency);
  if (!existing) {
    target.set(balance.currency, balance);
    return;
  }
  target.set(balance.currency, {
    ...existing,
    balance: addAmounts(existing.balance, balance.balance),
    priorBalance:
      existing.priorBalance && balance.priorBalance
        ? addAmounts(existing.priorBalance, balance.priorBalance)
        : existing.priorBalance ?? balance.priorBalance,
  });
}

/**
 * Balances come from the cash/forex sections: a Cash Report's Ending Cash
 * first, then Forex Balances rows. Only when neither is present do the
 * mark-to-market summary's Forex rows stand in. Amounts stay per currency.
 */
function reconcileForex(
  group: AccountRecords,
  asOfDate: string,
  tolerance: number,
  warnings: WarningCollector,
): ForexBalance[] {
  const cashReport = new Map<string, ForexBalance>();
  const startingCash = new Map<string, CurrencyAmount>();
  const forexSection = new Map<string, ForexBalance>();
  const summary = new Map<string, ForexBalance>();

  for (const entry of group.cashEntries) {
    const label = entry.label.trim().toLowerCase();
    if (label === ENDING_CASH.toLowerCase()) {
      accumulate(cashReport, {
        kind: 'forex_balance',
        accountId: group.accountId,
        currency: entry.amount.currency,
        balance: entry.amount,
        asOfDate,
        source: 'cash_forex',
        lineNumber: entry.lineNumber,
      });
    } else if (label === STARTING_CASH.toLowerCase()) {
      const prior = startingCash.get(entry.amount.currency);
      startingCash.set(entry.amount.currency, prior ? addAmounts(prior, entry.amount) : entry.amount);
    }
  }

  for (const balance of group.forexBalances) {
    accumulate(balance.source === 'cash_forex' ? forexSection : summary, balance);
  }

  const currencies = [...new Set([...cashReport.keys(), ...forexSection.keys()])];
  if (currencies.length === 0) {
    return [...summary.values()]
      .map((b) => ({ ...b, accountId: group.accountId }))
      .sort((a, b) => a.currency.localeCompare(b.currency));
  }

  return currencies.sort().map((currency) => {
    const fromReport = cashReport.get(currency);
    const fromSection = forexSection.get(currency);
    const fromSummary = summary.get(currency);

    if (fromReport && fromSection && Math.abs(fromReport.balance.amount - fromSection.balance.amount) > tolerance) {
      warnings.add(
        'forex_discrepancy',
        `${currency}: Cash Report ends at ${fromReport.balance.amount}, Forex Balances reports ${fromSection.balance.amount}`,
        { currency },
      );
    }

    const primary = fromReport ?? fromSection;
    const balance = primary ? primary.balance : zero(currency);
    return {
      kind: 'forex_balance',
      accountId: group.accountId,
      currency,
      balance: roundAmount(balance),
      priorBalance: startingCash.get(currency) ?? primary?.priorBalance ?? fromSummary?.priorBalance,
      exchangeRate: fromSection?.exchangeRate ?? fromSummary?.exchangeRate,
      asOfDate,
      source: 'cash_forex',
      lineNumber: primary?.lineNumber ?? 0,
    };
  });
}

/**
 * For each currency bought or sold as the base leg of a forex pair, the
 * balance change over the period should match the net quantity traded.
 */
function crossCheckForex(
  balances: readonly ForexBalance[],
  trades: readonly TradeRecord[],
  tolerance: number,
  warnings: WarningCollector,
): void {
  const traded = new Map<string, number>();
  for (const trade of trades) {
    const base = trade.instrument.assetClass === 'forex' ? trade.instrument.forex?.base : undefined;
    if (base) traded.set(base, (traded.get(base) ?? 0) + trade.quantity);
  }

  for (const [currency, net] of traded) {
    const balance = balances.find((b) => b.currency === currency);
    if (!balance?.priorBalance) continue;
    const change = subtractAmounts(balance.balance, balance.priorBalance).amount;
    if (Math.abs(change - net) > tolerance) {
      warnings.add(
        'forex_discrepancy',
        `${currency}: balance moved ${roundCents(change)} but forex trades net ${roundCents(net)}`,
        { currency },
      );
    }
  }
}

// ─── Snapshot ─────────────────────────────────────────────────────────────────

function reconcileAccount(
  group: AccountRecords,
  input: ReconcileInput,
  tolerance: number,
): { snapshot: PortfolioSnapshot; warnings: ReconciliationWarning[] } {
  const warnings = new WarningCollector(group.accountId);
  const base = input.baseCurrency;

  for (const record of [...group.positions, ...group.trades]) {
    if (record.classificationIssue) {
      warnings.add(record.classificationIssue.reason, record.classificationIssue.message, {
        instrument_id: record.instrument.id,
      });
    }
  }

  const tradesByInstrument = groupBy(group.trades, (t) => t.instrument.id);
  const merged = mergePositions(group.positions, tradesByInstrument, warnings);

  const positions: SnapshotPosition[] = merged.map((position) =>
    position.instrument.option
      ? toOptionPosition(position, position.instrument.option, tradesByInstrument.get(position.instrument.id) ?? [], warnings)
      : position,
  );

  let credit = zero(base);
  let debit = zero(base);
  let openShortOptions = 0;
  const equity = new CurrencyLedger();

  for (const position of positions) {
    if (position.quantity === 0) continue;

    if (position.instrument.assetClass === 'equity') {
      equity.add(amountOf(position.currency, position.quantity * position.markPrice * position.multiplier));
      continue;
    }

    if (!('side' in position)) continue;

    if (position.currency !== base) {
      warnings.add(
        'non_base_currency_option',
        `${position.instrument.id} is in ${position.currency}; only ${base} options count toward the ${base} totals`,
        { instrument_id: position.instrument.id, currency: position.currency },
      );
      continue;
    }

    if (position.side === 'short') {
      credit = addAmounts(credit, subtractAmounts(position.premiumReceived, position.premiumPaidToClose));
      openShortOptions++;
    } else {
      debit = addAmounts(debit, amountOf(base, position.quantity * position.markPrice * position.multiplier));
    }
  }

  const forexBalances = reconcileForex(group, input.asOfDate, tolerance, warnings);
  crossCheckForex(forexBalances, group.trades, tolerance, warnings);

  if (group.positions.length > 0) {
    const known = new Set(merged.map((p) => p.instrument.id));
    for (const trade of group.trades) {
      if (trade.instrument.assetClass === 'forex' || known.has(trade.instrument.id)) continue;
      warnings.add(
        'trade_without_position',
        `${trade.instrument.id} was traded but appears in neither Open Positions nor the mark-to-market summary`,
        { instrument_id: trade.instrument.id },
      );
    }
  }

  return {
    snapshot: {
      accountId: group.accountId,
      asOfDate: input.asOfDate,
      baseCurrency: base,
      optionsCredit: roundAmount(credit),
      optionsDebit: roundAmount(debit),
      optionBalance: roundAmount(addAmounts(credit, debit)),
      openShortOptions,
      equityValue: equity.totals(),
      forexBalances,
      positions,
      warningCount: warnings.warnings.length,
    },
    warnings: warnings.warnings,
  };
}

/**
 * Merge one run's records into one snapshot per account (or a single
 * consolidated snapshot). Data problems never throw: each becomes a
 * warning and the snapshot is built from whatever is usable.
 */
export function reconcile(input: ReconcileInput, options: ReconcileOptions = {}): ReconcileResult {
  const consolidate = options.consolidateAccounts ?? false;
  const tolerance = options.forexTolerance ?? 0.01;

  const groups = new Map<string, AccountRecords>();
  const groupFor = (accountId: string): AccountRecords => {
    const key = consolidate ? input.accountId : accountId;
    let group = groups.get(key);
    if (!group) {
      group = { accountId: key, trades: [], positions: [], forexBalances: [], cashEntries: [] };
      groups.set(key, group);
    }
    return group;
  };

  for (const trade of input.trades) groupFor(trade.accountId).trades.push(trade);
  for (const position of input.positions) groupFor(position.accountId).positions.push(position);
  for (const balance of input.forexBalances) groupFor(balance.accountId).forexBalances.push(balance);
  for (const entry of input.cashEntries) groupFor(entry.accountId).cashEntries.push(entry);
  if (groups.size === 0) groupFor(input.accountId);

  const snapshots: PortfolioSnapshot[] = [];
  const warnings: ReconciliationWarning[] = [];

  for (const key of [...groups.keys()].sort()) {
    const group = groups.get(key);
    if (!group) continue;
    const result = reconcileAccount(group, input, tolerance);
    snapshots.push(result.snapshot);
    warnings.push(...result.warnings);
  }

  return { snapshots, warnings };
}
