/**
 * SectionParser: the shared interface every section-kind parser implements.
 * Parsers only turn lines into records; they never touch storage.
 */

import type { FieldWarning } from '../errors.js';
import { describeError } from '../errors.js';
import { ColumnIndex, FieldError, RowReader } from '../statement/fields.js';
import type { ParsedRecord, Section, SectionKind, StatementLine } from '../statement/types.js';

export interface ParseContext {
  /** Account the statement belongs to; an `Account` column overrides it per row. */
  accountId: string;
  asOfDate: string;             // YYYY-MM-DD
  baseCurrency: string;
  optionMultiplier: number;
}

export interface SectionParseResult<R extends ParsedRecord = ParsedRecord> {
  records: R[];
  warnings: FieldWarning[];
}

export interface SectionParser<R extends ParsedRecord = ParsedRecord> {
  readonly kind: SectionKind;
  parse(section: Section, context: ParseContext): SectionParseResult<R>;
}

const SUMMARY_LABELS = /^(total|subtotal|notes)$/i;

function summaryLabel(line: StatementLine): string {
  return SUMMARY_LABELS.test(line.discriminator) ? line.discriminator : line.values[0] ?? line.discriminator;
}

/**
 * Run `parseLine` over every record line of a section. A line that throws
 * becomes one FieldWarning, and each Total / SubTotal / Notes line becomes an
 * `aggregate_row` warning, so every non-header line yields exactly one record
 * or one warning.
 */
export function parseSectionLines<R extends ParsedRecord>(
  section: Section,
  parseLine: (row: RowReader, line: StatementLine) => R,
): SectionParseResult<R> {
  const columns = new ColumnIndex(section.header);
  const records: R[] = [];
  const warnings: FieldWarning[] = [];

  for (const line of section.lines) {
    try {
      records.push(parseLine(new RowReader(columns, line), line));
    } catch (e) {
      const fieldError = e instanceof FieldError ? e : undefined;
      warnings.push({
        type: 'field',
        reason: fieldError?.reason ?? 'malformed_row',
        message: describeError(e),
        field: fieldError?.field,
        value: fieldError?.value,
        section_index: section.index,
        section_kind: section.kind,
        line_number: line.lineNumber,
      });
    }
  }

  for (const line of section.summaryLines) {
    const label = summaryLabel(line);
    warnings.push({
      type: 'field',
      reason: 'aggregate_row',
      message: `${label} row summarizes other lines`,
      value: label,
      section_index: section.index,
      section_kind: section.kind,
      line_number: line.lineNumber,
    });
  }

  return { records, warnings };
}
