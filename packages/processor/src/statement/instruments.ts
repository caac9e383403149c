import { coerceDate } from './fields.js';
import type { AssetClass, ClassificationIssue, Instrument, OptionContract } from './types.js';

// e.g. "ASTS 07FEB25 26 C", "BRK B 17JAN25 400.5 P"
const OPTION_SYMBOL = /^([A-Z0-9.]+(?: [A-Z])?) (\d{1,2}[A-Z]{3}\d{2}) (\d+(?:\.\d+)?) ([CP])$/;
// e.g. "EUR.USD"
const FOREX_PAIR = /^([A-Z]{3})\.([A-Z]{3})$/;
const CURRENCY_CODE = /^[A-Z]{3}$/;
// e.g. "AAPL", "BRK B", "RDS.A", "7203"
const TICKER = /^[A-Z0-9][A-Z0-9.-]{0,11}(?: [A-Z])?$/;

/**
 * Statement asset categories → asset class. A category listed as null is a
 * real statement category that this ledger does not track.
 */
const CATEGORY_CLASSES: Record<string, AssetClass | null> = {
  'stocks': 'equity',
  'stock': 'equity',
  'equities': 'equity',
  'etfs': 'equity',
  'equity and index options': 'option',
  'options': 'option',
  'forex': 'forex',
  'cash': 'forex',
  'futures': null,
  'options on futures': null,
  'bonds': null,
  'warrants': null,
  'cfds': null,
  'crypto': null,
};

export function categoryClass(category: string | undefined): AssetClass | null | undefined {
  if (!category) return undefined;
  const key = category.trim().toLowerCase();
  return Object.hasOwn(CATEGORY_CLASSES, key) ? CATEGORY_CLASSES[key] : undefined;
}

export function parseOptionSymbol(symbol: string): OptionContract | undefined {
  const match = OPTION_SYMBOL.exec(symbol);
  if (!match) return undefined;
  const [, underlying = '', expiryToken = '', strikeToken = '', right = ''] = match;

  const expiry = coerceDate(expiryToken, ['ddMMMyy']);
  if (!expiry.ok || expiry.value === undefined) return undefined;

  return {
    underlying,
    expiry: expiry.value,
    strike: Number(strikeToken),
    right: right === 'C' ? 'call' : 'put',
  };
}

export interface Classification {
  instrument: Instrument;
  issue?: ClassificationIssue;
}

function mismatch(id: string, shape: AssetClass, category: string): ClassificationIssue {
  return {
    reason: 'category_mismatch',
    message: `"${id}" looks like ${shape} but is listed under "${category}"`,
  };
}

/**
 * Classify an instrument identifier by its shape. The statement's asset
 * category is a hint: it disambiguates bare currency codes, and a category
 * that contradicts the shape is reported while the shape wins.
 */
export function classifyInstrument(rawId: string, category?: string): Classification {
  const id = rawId.trim().replace(/\s+/g, ' ');
  const hint = categoryClass(category);

  if (hint === null) {
    return {
      instrument: { id, assetClass: 'unclassified' },
      issue: {
        reason: 'unclassified_instrument',
        message: `"${id}" is in untracked asset category "${category ?? ''}"`,
      },
    };
  }

  const check = (shape: AssetClass): ClassificationIssue | undefined =>
    hint !== undefined && hint !== shape && category ? mismatch(id, shape, category) : undefined;

  const option = parseOptionSymbol(id);
  if (option) {
    return { instrument: { id, assetClass: 'option', option }, issue: check('option') };
  }

  const pair = FOREX_PAIR.exec(id);
  if (pair) {
    const [, base = '', quote = ''] = pair;
    return { instrument: { id, assetClass: 'forex', forex: { base, quote } }, issue: check('forex') };
  }

  if (CURRENCY_CODE.test(id) && hint === 'forex') {
    return { instrument: { id, assetClass: 'forex', forex: { base: id } } };
  }

  if (TICKER.test(id)) {
    return { instrument: { id, assetClass: 'equity' }, issue: check('equity') };
  }

  return {
    instrument: { id, assetClass: 'unclassified' },
    issue: {
      reason: 'unclassified_instrument',
      message: `"${id}" does not look like an equity, option or forex identifier`,
    },
  };
}

export function isCurrencyCode(value: string): boolean {
  return CURRENCY_CODE.test(value);
}
