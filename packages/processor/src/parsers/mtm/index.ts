import { amountOf } from '../../money.js';
import { FieldError, field } from '../../statement/fields.js';
import { categoryClass, classifyInstrument, isCurrencyCode } from '../../statement/instruments.js';
import type { ForexBalance, PositionRecord, Section } from '../../statement/types.js';
import { parseSectionLines } from '../interface.js';
import type { ParseContext, SectionParser, SectionParseResult } from '../interface.js';

const ACCOUNT = field('Account');
const CATEGORY = field('Asset Category');
const SYMBOL = field('Symbol');
const PRIOR_QUANTITY = field('Prior Quantity');
const CURRENT_QUANTITY = field('Current Quantity');
const PRIOR_PRICE = field('Prior Price');
const CURRENT_PRICE = field('Current Price');
const PL_POSITION = field('Mark-to-Market P/L Position');

/**
 * Mark-to-Market Performance Summary. Amounts are reported in the base
 * currency. `Forex` rows hold cash per currency (symbol = currency code,
 * quantity = balance, prior price = rate to base) and become forex balances; all other rows become
 * positions, including ones closed during the period (current quantity 0).
 */
export class MtmSummaryParser implements SectionParser<PositionRecord | ForexBalance> {
  readonly kind = 'mtm_summary' as const;

  parse(section: Section, context: ParseContext): SectionParseResult<PositionRecord | ForexBalance> {
    return parseSectionLines<PositionRecord | ForexBalance>(section, (row, line) => {
      const category = row.text(CATEGORY);
      const symbol = row.requireText(SYMBOL);
      const accountId = row.text(ACCOUNT) ?? context.accountId;
      const quantity = row.requireNumber(CURRENT_QUANTITY);
      const priorQuantity = row.number(PRIOR_QUANTITY);

      if (categoryClass(category) === 'forex') {
        if (!isCurrencyCode(symbol)) {
          throw new FieldError('invalid_value', `"${symbol}" is not a currency code`, SYMBOL.label, symbol);
        }
        return {
          kind: 'forex_balance',
          accountId,
          currency: symbol,
          balance: amountOf(symbol, quantity),
          priorBalance: priorQuantity === undefined ? undefined : amountOf(symbol, priorQuantity),
          exchangeRate: row.number(PRIOR_PRICE) ?? row.number(CURRENT_PRICE),
          asOfDate: context.asOfDate,
          source: 'mtm_summary',
          lineNumber: line.lineNumber,
        };
      }

      const { instrument, issue } = classifyInstrument(symbol, category);
      return {
        kind: 'position',
        accountId,
        instrument,
        classificationIssue: issue,
        quantity,
        priorQuantity,
        markPrice: row.number(CURRENT_PRICE) ?? 0,
        priorPrice: row.number(PRIOR_PRICE),
        plDelta: row.number(PL_POSITION),
        currency: context.baseCurrency,
        multiplier: instrument.assetClass === 'option' ? context.optionMultiplier : 1,
        asOfDate: context.asOfDate,
        source: 'mtm_summary',
        lineNumber: line.lineNumber,
      };
    });
  }
}
