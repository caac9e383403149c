import { FieldError, field } from '../../statement/fields.js';
import { classifyInstrument } from '../../statement/instruments.js';
import type { PositionRecord, Section } from '../../statement/types.js';
import { parseSectionLines } from '../interface.js';
import type { ParseContext, SectionParser, SectionParseResult } from '../interface.js';

const ACCOUNT = field('Account');
const DISCRIMINATOR = field('DataDiscriminator');
const CATEGORY = field('Asset Category', 'AssetClass');
const CURRENCY = field('Currency', 'CurrencyPrimary');
const SYMBOL = field('Symbol');
const QUANTITY = field('Quantity', 'Position');
const MULTIPLIER = field('Mult', 'Multiplier');
const COST_BASIS = field('Cost Basis', 'CostBasisMoney');
const MARK_PRICE = field('Close Price', 'Mark Price', 'MarkPrice', 'Current Price');
const VALUE = field('Value', 'PositionValue');

/**
 * Open Positions. When the section breaks positions into lots, only the
 * `Summary` rows are positions; `Lot` rows become `lot_detail` warnings.
 */
export class PositionsParser implements SectionParser<PositionRecord> {
  readonly kind = 'positions' as const;

  parse(section: Section, context: ParseContext): SectionParseResult<PositionRecord> {
    return parseSectionLines(section, (row, line) => {
      const discriminator = row.text(DISCRIMINATOR);
      if (discriminator && discriminator.toLowerCase() !== 'summary') {
        throw new FieldError('lot_detail', `${discriminator} row is a breakdown of a summary position`, DISCRIMINATOR.label, discriminator);
      }

      const { instrument, issue } = classifyInstrument(row.requireText(SYMBOL), row.text(CATEGORY));
      const quantity = row.requireNumber(QUANTITY);
      const multiplier =
        row.number(MULTIPLIER) ?? (instrument.assetClass === 'option' ? context.optionMultiplier : 1);

      let markPrice = row.number(MARK_PRICE);
      if (markPrice === undefined) {
        const value = row.number(VALUE);
        if (value === undefined || quantity === 0) {
          throw new FieldError('missing_field', `${MARK_PRICE.label} is empty`, MARK_PRICE.label);
        }
        markPrice = value / (quantity * multiplier);
      }

      return {
        kind: 'position',
        accountId: row.text(ACCOUNT) ?? context.accountId,
        instrument,
        classificationIssue: issue,
        quantity,
        costBasis: row.number(COST_BASIS),
        markPrice,
        currency: (row.text(CURRENCY) ?? context.baseCurrency).toUpperCase(),
        multiplier,
        asOfDate: context.asOfDate,
        source: 'positions',
        lineNumber: line.lineNumber,
      };
    });
  }
}
