import { CurrencyMismatchError } from './errors.js';

/**
 * An amount tagged with its ISO currency code. Amounts in different
 * currencies are never added together here; consolidation into a single
 * currency happens downstream.
 */
export interface CurrencyAmount<C extends string = string> {
  readonly currency: C;
  readonly amount: number;
}

export function amountOf<C extends string>(currency: C, amount: number): CurrencyAmount<C> {
  return { currency, amount };
}

export function zero<C extends string>(currency: C): CurrencyAmount<C> {
  return { currency, amount: 0 };
}

function assertSameCurrency(expected: string, actual: string): void {
  if (expected !== actual) {
    throw new CurrencyMismatchError(expected, actual);
  }
}

export function addAmounts<C extends string>(
  a: CurrencyAmount<C>,
  b: CurrencyAmount<NoInfer<C>>,
): CurrencyAmount<C> {
  assertSameCurrency(a.currency, b.currency);
  return { currency: a.currency, amount: a.amount + b.amount };
}

export function subtractAmounts<C extends string>(
  a: CurrencyAmount<C>,
  b: CurrencyAmount<NoInfer<C>>,
): CurrencyAmount<C> {
  assertSameCurrency(a.currency, b.currency);
  return { currency: a.currency, amount: a.amount - b.amount };
}

export function sumAmounts<C extends string>(
  currency: C,
  amounts: readonly CurrencyAmount<NoInfer<C>>[],
): CurrencyAmount<C> {
  return amounts.reduce<CurrencyAmount<C>>((total, next) => addAmounts(total, next), zero(currency));
}

/** Rounds to cents, which is the precision statements report in. */
export function roundAmount<C extends string>(value: CurrencyAmount<C>): CurrencyAmount<C> {
  return { currency: value.currency, amount: roundCents(value.amount) };
}

export function roundCents(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Accumulates amounts per currency. Each currency keeps its own running
 * total; `totals()` returns one amount per currency, sorted by code.
 */
export class CurrencyLedger {
  private readonly balances = new Map<string, CurrencyAmount>();

  add(value: CurrencyAmount): void {
    const current = this.balances.get(value.currency);
    this.balances.set(value.currency, current ? addAmounts(current, value) : value);
  }

  get(currency: string): CurrencyAmount | undefined {
    return this.balances.get(currency);
  }

  totals(): CurrencyAmount[] {
    return [...this.balances.values()]
      .map(roundAmount)
      .sort((a, b) => a.currency.localeCompare(b.currency));
  }
}
