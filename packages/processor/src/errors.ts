import type { SectionKind } from './statement/types.js';

// ─── Fatal errors ─────────────────────────────────────────────────────────────

export type StructuralErrorCode =
  | 'unrecognized_format'
  | 'missing_section'
  | 'missing_account';

/**
 * The statement cannot be interpreted at all. Nothing is written and the
 * document is flagged for manual review.
 */
export class StructuralError extends Error {
  readonly code: StructuralErrorCode;

  constructor(code: StructuralErrorCode, message: string) {
    super(message);
    this.name = 'StructuralError';
    this.code = code;
  }
}

/**
 * The transactional write failed and was rolled back. The document can be
 * retried as-is.
 */
export class PersistenceError extends Error {
  readonly code = 'write_failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export class CurrencyMismatchError extends Error {
  readonly code = 'currency_mismatch';

  constructor(expected: string, actual: string) {
    super(`Cannot combine ${actual} amount with ${expected} amount`);
    this.name = 'CurrencyMismatchError';
  }
}

// ─── Recoverable warnings ─────────────────────────────────────────────────────

export type FieldWarningReason =
  | 'invalid_number'
  | 'invalid_date'
  | 'missing_field'
  | 'invalid_value'
  | 'lot_detail'
  | 'aggregate_row'
  | 'malformed_row';

export interface FieldWarning {
  type: 'field';
  reason: FieldWarningReason;
  message: string;
  field?: string;
  value?: string;
  /** Absent for document-level issues raised before sections exist. */
  section_index?: number;
  section_kind?: SectionKind;
  line_number?: number;
}

export type ReconciliationWarningReason =
  | 'unclassified_instrument'
  | 'category_mismatch'
  | 'duplicate_record'
  | 'quantity_conflict'
  | 'premium_estimated'
  | 'non_base_currency_option'
  | 'forex_discrepancy'
  | 'trade_without_position'
  | 'account_mismatch';

export interface ReconciliationWarning {
  type: 'reconciliation';
  reason: ReconciliationWarningReason;
  message: string;
  account_id: string;
  instrument_id?: string;
  currency?: string;
}

export type Warning = FieldWarning | ReconciliationWarning;

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
