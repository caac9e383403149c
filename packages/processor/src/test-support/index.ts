// Builders shared by the test suites. Not exported from the package.

import { readFileSync } from 'node:fs';
import Papa from 'papaparse';
import type { ParseContext } from '../parsers/interface.js';
import { tokenizeStatement } from '../statement/tokenizer.js';
import type { Section, StatementDocument, StatementMetadata } from '../statement/types.js';

const FIXTURES = new URL('../../fixtures/', import.meta.url);

export function readFixture(name: string): string {
  return readFileSync(new URL(name, FIXTURES), 'utf-8');
}

/** The sample activity statement: account U1234567, 2025-01-16, base USD. */
export const ACTIVITY_STATEMENT = 'activity-statement.csv';

type Cell = string | number;

/**
 * Rows for one statement section: a `Header` row, then one row per entry.
 * An entry whose first cell is `Total`, `SubTotal` or `Notes` is written
 * with that discriminator instead of `Data`.
 */
export function section(name: string, header: string[], rows: Cell[][] = []): Cell[][] {
  const discriminators = new Set(['Total', 'SubTotal', 'Notes']);
  return [
    [name, 'Header', ...header],
    ...rows.map((row) => {
      const [first, ...rest] = row;
      return typeof first === 'string' && discriminators.has(first)
        ? [name, first, ...rest]
        : [name, 'Data', ...row];
    }),
  ];
}

/** Join sections into statement text, one CSV row per line, quoting as needed. */
export function statement(...sections: Cell[][][]): string {
  return Papa.unparse(sections.flat(), { newline: '\n' });
}

/** Tokenize a single section built with `section()`. */
export function tokenizedSection(name: string, header: string[], rows: Cell[][]): Section {
  const [first] = tokenizeStatement(statement(section(name, header, rows))).sections;
  if (!first) throw new Error(`No section produced for ${name}`);
  return first;
}

export const CONTEXT: ParseContext = {
  accountId: 'U1234567',
  asOfDate: '2025-01-16',
  baseCurrency: 'USD',
  optionMultiplier: 100,
};

export function statementDocument(text: string, metadata: Partial<StatementMetadata> = {}): StatementDocument {
  return {
    text,
    metadata: {
      accountId: 'U1234567',
      periodStart: '2025-01-16',
      periodEnd: '2025-01-16',
      ingestedAt: '2025-01-17T06:00:00.000Z',
      ...metadata,
    },
  };
}

// Column layouts as the statements print them.

export const TRADES_HEADER = [
  'DataDiscriminator', 'Asset Category', 'Currency', 'Symbol', 'Date/Time',
  'Quantity', 'T. Price', 'Proceeds', 'Comm/Fee', 'Code',
];

export const POSITIONS_HEADER = [
  'DataDiscriminator', 'Asset Category', 'Currency', 'Symbol', 'Quantity',
  'Mult', 'Cost Basis', 'Close Price', 'Value',
];

export const MTM_HEADER = [
  'Asset Category', 'Symbol', 'Prior Quantity', 'Current Quantity',
  'Prior Price', 'Current Price', 'Mark-to-Market P/L Position',
];

export const FOREX_HEADER = ['Asset Category', 'Currency', 'Description', 'Quantity', 'Close Price'];

export const CASH_REPORT_HEADER = ['Currency Summary', 'Currency', 'Total'];
