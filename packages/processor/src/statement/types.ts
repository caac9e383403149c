// Domain types shared by the tokenizer, section parsers and reconciler.

import type { CurrencyAmount } from '../money.js';

export type SectionKind =
  | 'account_info'
  | 'mtm_summary'
  | 'trades'
  | 'positions'
  | 'cash_forex'
  | 'unknown';

export type AssetClass = 'equity' | 'option' | 'forex';
export type InstrumentClass = AssetClass | 'unclassified';

// ─── Documents & sections ─────────────────────────────────────────────────────

export interface StatementMetadata {
  /** Omitted when the statement's Account Information section names the account. */
  accountId?: string;
  periodStart: string;          // YYYY-MM-DD
  periodEnd: string;            // YYYY-MM-DD, the snapshot's as-of date
  ingestedAt: string;           // ISO timestamp
  baseCurrency?: string;
  /** Section kinds the statement claims to cover; absence is fatal. */
  expectedSections?: SectionKind[];
  /** Original file name or mail subject, kept for the audit trail. */
  source?: string;
}

export interface StatementDocument {
  readonly text: string;
  readonly metadata: Readonly<StatementMetadata>;
}

export interface StatementLine {
  lineNumber: number;
  sectionName: string;
  discriminator: string;
  /** Fields after the section name and row discriminator. */
  values: string[];
}

export interface Section {
  index: number;
  kind: SectionKind;
  name: string;
  /** Column names from the section's Header row; empty when it had none. */
  header: string[];
  /** Record lines. Header and summary rows are excluded. */
  lines: StatementLine[];
  /** Total / SubTotal / Notes rows. */
  summaryLines: StatementLine[];
  startLine: number;
  endLine: number;
}

// ─── Instruments ──────────────────────────────────────────────────────────────

export type OptionRight = 'call' | 'put';
export type OptionSide = 'long' | 'short';

export interface OptionContract {
  underlying: string;
  expiry: string;               // YYYY-MM-DD
  strike: number;
  right: OptionRight;
}

export interface Instrument {
  readonly id: string;
  readonly assetClass: InstrumentClass;
  readonly option?: OptionContract;
  /** For forex: the traded currency, and the quote currency of a pair. */
  readonly forex?: { base: string; quote?: string };
}

export interface ClassificationIssue {
  reason: 'unclassified_instrument' | 'category_mismatch';
  message: string;
}

// ─── Parsed records ───────────────────────────────────────────────────────────

export type TradeAction = 'buy' | 'sell' | 'assignment' | 'expiration' | 'exercise';
export type OpenClose = 'open' | 'close' | 'unknown';

export interface TradeRecord {
  readonly kind: 'trade';
  readonly accountId: string;
  readonly instrument: Instrument;
  readonly classificationIssue?: ClassificationIssue;
  readonly action: TradeAction;
  readonly openClose: OpenClose;
  readonly quantity: number;
  readonly price: number;
  readonly currency: string;
  readonly tradeDate: string;
  readonly proceeds: number;
  readonly commission: number;
  readonly lineNumber: number;
}

export type PositionSource = 'positions' | 'mtm_summary';

export interface PositionRecord {
  readonly kind: 'position';
  readonly accountId: string;
  readonly instrument: Instrument;
  readonly classificationIssue?: ClassificationIssue;
  readonly quantity: number;
  readonly priorQuantity?: number;
  readonly costBasis?: number;
  readonly markPrice: number;
  readonly priorPrice?: number;
  readonly plDelta?: number;
  readonly currency: string;
  readonly multiplier: number;
  readonly asOfDate: string;
  readonly source: PositionSource;
  readonly lineNumber: number;
}

/** `none` for long options, which collect no premium. */
export type PremiumSource = 'trades' | 'cost_basis' | 'mark' | 'none';

export interface OptionPosition extends PositionRecord {
  readonly underlying: string;
  readonly strike: number;
  readonly expiry: string;
  readonly right: OptionRight;
  readonly side: OptionSide;
  readonly premiumReceived: CurrencyAmount;
  readonly premiumPaidToClose: CurrencyAmount;
  readonly premiumSource: PremiumSource;
}

export interface ForexBalance {
  readonly kind: 'forex_balance';
  readonly accountId: string;
  readonly currency: string;
  readonly balance: CurrencyAmount;
  readonly priorBalance?: CurrencyAmount;
  /** Rate to the base currency as reported; informational only. */
  readonly exchangeRate?: number;
  readonly asOfDate: string;
  readonly source: 'cash_forex' | 'mtm_summary';
  readonly lineNumber: number;
}

/** One row of a Cash Report (Starting Cash, Commissions, Ending Cash, …). */
export interface CashReportEntry {
  readonly kind: 'cash_entry';
  readonly accountId: string;
  readonly label: string;
  readonly amount: CurrencyAmount;
  readonly lineNumber: number;
}

export interface AccountField {
  readonly kind: 'account_field';
  readonly field: string;
  readonly value: string;
  readonly lineNumber: number;
}

export type ParsedRecord = TradeRecord | PositionRecord | ForexBalance | CashReportEntry | AccountField;

// ─── Snapshots ────────────────────────────────────────────────────────────────

export type SnapshotPosition = PositionRecord | OptionPosition;

export interface PortfolioSnapshot {
  readonly accountId: string;
  readonly asOfDate: string;
  readonly baseCurrency: string;
  readonly optionsCredit: CurrencyAmount;
  readonly optionsDebit: CurrencyAmount;
  /** Options credit plus options debit. */
  readonly optionBalance: CurrencyAmount;
  readonly openShortOptions: number;
  /** One entry per currency; never converted. */
  readonly equityValue: CurrencyAmount[];
  readonly forexBalances: ForexBalance[];
  readonly positions: SnapshotPosition[];
  readonly warningCount: number;
}

export function isOptionPosition(position: SnapshotPosition): position is OptionPosition {
  return 'side' in position;
}
