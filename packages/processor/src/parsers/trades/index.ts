import { FieldError, field } from '../../statement/fields.js';
import { classifyInstrument } from '../../statement/instruments.js';
import type { OpenClose, Section, TradeAction, TradeRecord } from '../../statement/types.js';
import { parseSectionLines } from '../interface.js';
import type { ParseContext, SectionParser, SectionParseResult } from '../interface.js';

const ACCOUNT = field('Account');
const DISCRIMINATOR = field('DataDiscriminator');
const CATEGORY = field('Asset Category', 'AssetClass');
const CURRENCY = field('Currency', 'CurrencyPrimary');
const SYMBOL = field('Symbol');
const DATE = field('Date/Time', 'TradeDate', 'Trade Date', 'Date');
const QUANTITY = field('Quantity');
const PRICE = field('T. Price', 'TradePrice', 'Price');
const PROCEEDS = field('Proceeds');
const COMMISSION = field('Comm/Fee', 'Comm in USD', 'IBCommission', 'Commission');
const CODE = field('Code', 'Notes/Codes');

// Executions and closed-lot breakdowns repeat an order's quantity.
const DETAIL_ROWS = new Set(['closedlot', 'execution']);

/**
 * Split a `Code` value such as "O;P" or "C;Ep" into its letters.
 */
export function tradeCodes(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(/[;,\s]+/)
    .map((c) => c.trim())
    .filter((c) => c !== '');
}

export function tradeAction(quantity: number, codes: string[]): TradeAction {
  if (codes.includes('Ep')) return 'expiration';
  if (codes.includes('A')) return 'assignment';
  if (codes.includes('Ex')) return 'exercise';
  return quantity < 0 ? 'sell' : 'buy';
}

export function openClose(codes: string[]): OpenClose {
  if (codes.includes('O')) return 'open';
  if (codes.includes('C')) return 'close';
  return 'unknown';
}

export class TradesParser implements SectionParser<TradeRecord> {
  readonly kind = 'trades' as const;

  parse(section: Section, context: ParseContext): SectionParseResult<TradeRecord> {
    return parseSectionLines(section, (row, line) => {
      const discriminator = row.text(DISCRIMINATOR);
      if (discriminator && DETAIL_ROWS.has(discriminator.toLowerCase())) {
        throw new FieldError('lot_detail', `${discriminator} row repeats its order`, DISCRIMINATOR.label, discriminator);
      }

      const category = row.text(CATEGORY);
      const { instrument, issue } = classifyInstrument(row.requireText(SYMBOL), category);

      const quantity = row.requireNumber(QUANTITY);
      const price = row.requireNumber(PRICE);
      const tradeDate = row.requireDate(DATE);
      const codes = tradeCodes(row.text(CODE));

      const multiplier = instrument.assetClass === 'option' ? context.optionMultiplier : 1;
      const proceeds = row.number(PROCEEDS) ?? -quantity * price * multiplier;

      return {
        kind: 'trade',
        accountId: row.text(ACCOUNT) ?? context.accountId,
        instrument,
        classificationIssue: issue,
        action: tradeAction(quantity, codes),
        openClose: openClose(codes),
        quantity,
        price,
        currency: (row.text(CURRENCY) ?? context.baseCurrency).toUpperCase(),
        tradeDate,
        proceeds,
        commission: row.number(COMMISSION) ?? 0,
        lineNumber: line.lineNumber,
      };
    });
  }
}
