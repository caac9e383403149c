/**
 * SectionParserRegistry: maps section kinds to their parser.
 *
 * Usage:
 *   const registry = createParserRegistry();
 *   registry.get('trades')?.parse(section, context);
 */

import type { ParsedRecord, SectionKind } from '../statement/types.js';
import type { SectionParser } from './interface.js';
import { AccountInfoParser } from './account-info/index.js';
import { CashForexParser } from './cash-forex/index.js';
import { MtmSummaryParser } from './mtm/index.js';
import { PositionsParser } from './positions/index.js';
import { TradesParser } from './trades/index.js';

export class SectionParserRegistry {
  private readonly parsers = new Map<SectionKind, SectionParser<ParsedRecord>>();

  register(parser: SectionParser<ParsedRecord>): void {
    this.parsers.set(parser.kind, parser);
  }

  get(kind: SectionKind): SectionParser<ParsedRecord> | undefined {
    return this.parsers.get(kind);
  }

  get registeredKinds(): SectionKind[] {
    return [...this.parsers.keys()];
  }
}

export function createParserRegistry(): SectionParserRegistry {
  const registry = new SectionParserRegistry();
  registry.register(new AccountInfoParser());
  registry.register(new MtmSummaryParser());
  registry.register(new TradesParser());
  registry.register(new PositionsParser());
  registry.register(new CashForexParser());
  return registry;
}

/** Registry used when the caller does not supply one. */
export const defaultParserRegistry = createParserRegistry();
