import Papa from 'papaparse';
import { StructuralError } from '../errors.js';
import type { FieldWarning } from '../errors.js';
import type { Section, SectionKind, StatementLine } from './types.js';

export interface RawRow {
  lineNumber: number;
  fields: string[];
}

export interface SectionRule {
  readonly kind: Exclude<SectionKind, 'unknown'>;
  /** Lower runs first; list order breaks ties. */
  readonly precedence: number;
  readonly description: string;
  matches(row: RawRow): boolean;
}

function isHeaderRow(row: RawRow): boolean {
  return (row.fields[1] ?? '').trim().toLowerCase() === 'header';
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/** Matches a `<name>,Header,…` row for any of the given section names. */
export function headerNamed(...names: string[]): (row: RawRow) => boolean {
  return (row) => isHeaderRow(row) && names.some((name) => sameName(name, row.fields[0] ?? ''));
}

/**
 * The statement format contract. Extend it with new rules when a new
 * statement variant appears; never repurpose an existing one.
 */
export const SECTION_RULES: readonly SectionRule[] = [
  {
    kind: 'account_info',
    precedence: 10,
    description: 'Account Information',
    matches: headerNamed('Account Information'),
  },
  {
    kind: 'mtm_summary',
    precedence: 20,
    description: 'Mark-to-Market Performance Summary',
    matches: headerNamed('Mark-to-Market Performance Summary'),
  },
  {
    kind: 'trades',
    precedence: 30,
    description: 'Trades',
    matches: headerNamed('Trades'),
  },
  {
    kind: 'positions',
    precedence: 40,
    description: 'Open Positions',
    matches: headerNamed('Open Positions'),
  },
  {
    kind: 'cash_forex',
    precedence: 50,
    description: 'Forex Balances / Cash Report',
    matches: headerNamed('Forex Balances', 'Cash Report'),
  },
];

export function orderRules(rules: readonly SectionRule[]): SectionRule[] {
  return rules
    .map((rule, position) => ({ rule, position }))
    .sort((a, b) => a.rule.precedence - b.rule.precedence || a.position - b.position)
    .map(({ rule }) => rule);
}

const SUMMARY_DISCRIMINATORS = new Set(['total', 'subtotal', 'notes']);

function isSummaryLine(line: StatementLine): boolean {
  if (SUMMARY_DISCRIMINATORS.has(line.discriminator.toLowerCase())) return true;
  return /^(total|subtotal)\b/i.test(line.values[0] ?? '');
}

export interface TokenizedStatement {
  sections: Section[];
  /** Quoting problems reported by the CSV reader; rows are still kept. */
  issues: FieldWarning[];
}

export function readRows(text: string): { rows: RawRow[]; issues: FieldWarning[] } {
  const result = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), { delimiter: ',', skipEmptyLines: false });

  const rows: RawRow[] = [];
  result.data.forEach((fields, i) => {
    const trimmed = fields.map((f) => f.trim());
    if (trimmed.every((f) => f === '')) return;
    rows.push({ lineNumber: i + 1, fields: trimmed });
  });

  const issues: FieldWarning[] = result.errors.map((e) => ({
    type: 'field',
    reason: 'malformed_row',
    message: `${e.code}: ${e.message}`,
    line_number: e.row !== undefined ? e.row + 1 : undefined,
  }));

  return { rows, issues };
}

/**
 * Split a statement into labelled sections. Every `Header` row starts a new
 * section; the first matching rule names its kind and unmatched headers start
 * an `unknown` section. A data row belonging to a different section name than
 * the current one also starts an `unknown` section, so nothing in the document
 * is dropped.
 *
 * Throws StructuralError when no section is recognized.
 */
export function tokenizeStatement(
  text: string,
  rules: readonly SectionRule[] = SECTION_RULES,
): TokenizedStatement {
  const ordered = orderRules(rules);
  const { rows, issues } = readRows(text);

  const sections: Section[] = [];
  let current: Section | undefined;

  const open = (kind: SectionKind, name: string, header: string[], lineNumber: number): Section => {
    const section: Section = {
      index: sections.length,
      kind,
      name,
      header,
      lines: [],
      summaryLines: [],
      startLine: lineNumber,
      endLine: lineNumber,
    };
    sections.push(section);
    return section;
  };

  for (const row of rows) {
    const [name = '', discriminator = '', ...values] = row.fields;

    if (isHeaderRow(row)) {
      const rule = ordered.find((r) => r.matches(row));
      current = open(rule?.kind ?? 'unknown', name, values, row.lineNumber);
      continue;
    }

    if (!current || !sameName(current.name, name)) {
      current = open('unknown', name, [], row.lineNumber);
    }

    const line: StatementLine = { lineNumber: row.lineNumber, sectionName: name, discriminator, values };
    if (isSummaryLine(line)) {
      current.summaryLines.push(line);
    } else {
      current.lines.push(line);
    }
    current.endLine = row.lineNumber;
  }

  if (!sections.some((s) => s.kind !== 'unknown')) {
    throw new StructuralError(
      'unrecognized_format',
      sections.length === 0
        ? 'Statement is empty'
        : `Statement format unrecognized: none of ${sections.length} section(s) matched a known header`,
    );
  }

  return { sections, issues };
}
