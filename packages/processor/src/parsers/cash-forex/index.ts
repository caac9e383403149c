import { amountOf } from '../../money.js';
import { FieldError, field } from '../../statement/fields.js';
import type { RowReader } from '../../statement/fields.js';
import { isCurrencyCode } from '../../statement/instruments.js';
import type { CashReportEntry, ForexBalance, Section } from '../../statement/types.js';
import { parseSectionLines } from '../interface.js';
import type { ParseContext, SectionParser, SectionParseResult } from '../interface.js';

const ACCOUNT = field('Account');

// Forex Balances layout
const CURRENCY = field('Currency');
const DESCRIPTION = field('Description');
const QUANTITY = field('Quantity');
const CLOSE_PRICE = field('Close Price');

// Cash Report layout
const LINE_LABEL = field('Currency Summary');
const TOTAL = field('Total');

const BASE_SUMMARY = 'base currency summary';

export const STARTING_CASH = 'Starting Cash';
export const ENDING_CASH = 'Ending Cash';

function currencyOf(row: RowReader, f: typeof CURRENCY): string {
  const value = row.requireText(f).toUpperCase();
  if (!isCurrencyCode(value)) {
    throw new FieldError('invalid_value', `"${value}" is not a currency code`, f.label, value);
  }
  return value;
}

/**
 * Cash and forex balances, in either of the two layouts statements use:
 *
 *   Forex Balances: one row per currency held (`Description` names it,
 *                   `Currency` is the reporting currency).
 *   Cash Report:    labelled lines per currency (`Starting Cash`, …,
 *                   `Ending Cash`). Base-currency summary lines are
 *                   conversions and are skipped.
 */
export class CashForexParser implements SectionParser<ForexBalance | CashReportEntry> {
  readonly kind = 'cash_forex' as const;

  parse(section: Section, context: ParseContext): SectionParseResult<ForexBalance | CashReportEntry> {
    if (section.header.some((h) => h.trim().toLowerCase() === 'currency summary')) {
      return parseSectionLines<ForexBalance | CashReportEntry>(section, (row, line) => {
        const label = row.requireText(LINE_LABEL);
        const rawCurrency = row.requireText(CURRENCY);
        if (rawCurrency.toLowerCase() === BASE_SUMMARY) {
          throw new FieldError('aggregate_row', `${label} is a base-currency conversion`, CURRENCY.label, rawCurrency);
        }
        const currency = currencyOf(row, CURRENCY);
        return {
          kind: 'cash_entry',
          accountId: row.text(ACCOUNT) ?? context.accountId,
          label,
          amount: amountOf(currency, row.requireNumber(TOTAL)),
          lineNumber: line.lineNumber,
        };
      });
    }

    return parseSectionLines<ForexBalance | CashReportEntry>(section, (row, line) => {
      const description = row.text(DESCRIPTION);
      const currency =
        description && isCurrencyCode(description.toUpperCase())
          ? description.toUpperCase()
          : currencyOf(row, CURRENCY);
      return {
        kind: 'forex_balance',
        accountId: row.text(ACCOUNT) ?? context.accountId,
        currency,
        balance: amountOf(currency, row.requireNumber(QUANTITY)),
        exchangeRate: row.number(CLOSE_PRICE),
        asOfDate: context.asOfDate,
        source: 'cash_forex',
        lineNumber: line.lineNumber,
      };
    });
  }
}
