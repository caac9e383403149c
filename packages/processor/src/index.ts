/**
 * @statement-ledger/processor: brokerage statement ingestion.
 *
 * Call `openLedger()` to open (or create) the SQLite history at
 * ~/.statement-ledger/ledger.db, run any pending migrations, and get the
 * processing and query operations bound to it.
 */

import type { ProcessorConfig } from './config.js';
import { loadConfig } from './config.js';
import { getDb, resetDb } from './db/index.js';
import type { Database } from './db/index.js';
import type { ForexBalanceRow, SnapshotPositionRow, TradeDetailRow } from './db/types.js';
import {
  getForexHistory,
  getSnapshotDates,
  getSnapshotHistory,
  getSnapshotPositions,
  getTradeDetails,
} from './history/queries.js';
import type {
  ForexHistoryInput,
  SnapshotDate,
  SnapshotHistoryEntry,
  SnapshotHistoryInput,
  TradeDetailsInput,
} from './history/queries.js';
import { handleStatementRequest } from './ingress/index.js';
import type { StatementResponse } from './ingress/index.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { processStatement, processStatements } from './pipeline/index.js';
import type { BatchResult, ProcessingSummary } from './pipeline/index.js';
import type { StatementDocument } from './statement/types.js';

// ─── Ledger ───────────────────────────────────────────────────────────────────

export interface Ledger {
  readonly config: ProcessorConfig;
  readonly db: Database;
  readonly logger: Logger;
  process(document: StatementDocument): ProcessingSummary;
  processBatch(
    documents: Iterable<StatementDocument> | AsyncIterable<StatementDocument>,
    signal?: AbortSignal,
  ): Promise<BatchResult>;
  /** Validate and process a raw `{ csv_content, subject, … }` request body. */
  handle(payload: unknown): StatementResponse;
  snapshotHistory(input?: SnapshotHistoryInput): SnapshotHistoryEntry[];
  forexHistory(input?: ForexHistoryInput): ForexBalanceRow[];
  positions(account_id: string, as_of_date: string): SnapshotPositionRow[];
  trades(input?: TradeDetailsInput): TradeDetailRow[];
  dates(): SnapshotDate[];
  close(): void;
}

/**
 * Open the ledger. Configuration comes from `STATEMENT_*` environment
 * variables, with `overrides` taking precedence.
 */
export function openLedger(
  overrides: Partial<ProcessorConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): Ledger {
  const config = loadConfig(env, overrides);
  const logger = createLogger('statement-ledger', config.logLevel);
  const db = getDb(config.dbPath);
  const options = { config, logger };

  return {
    config,
    db,
    logger,
    process: (document) => processStatement(db, document, options),
    processBatch: (documents, signal) => processStatements(db, documents, { ...options, signal }),
    handle: (payload) => handleStatementRequest(db, payload, options),
    snapshotHistory: (input) => getSnapshotHistory(db, input),
    forexHistory: (input) => getForexHistory(db, input),
    positions: (account_id, as_of_date) => getSnapshotPositions(db, account_id, as_of_date),
    trades: (input) => getTradeDetails(db, input),
    dates: () => getSnapshotDates(db),
    close: resetDb,
  };
}

// Re-export public types and interfaces for consumers
export { getDb, resetDb } from './db/index.js';
export type { Database } from './db/index.js';
export type {
  SnapshotRow,
  SnapshotPositionRow,
  ForexBalanceRow,
  EquityValueRow,
  TradeDetailRow,
} from './db/types.js';
export { loadConfig, DEFAULT_CONFIG, ConfigSchema } from './config.js';
export type { ProcessorConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { StructuralError, PersistenceError, CurrencyMismatchError } from './errors.js';
export type { FieldWarning, ReconciliationWarning, Warning } from './errors.js';
export { CurrencyLedger, amountOf, addAmounts, subtractAmounts, sumAmounts } from './money.js';
export type { CurrencyAmount } from './money.js';
export type * from './statement/types.js';
export { isOptionPosition } from './statement/types.js';
export { tokenizeStatement, SECTION_RULES, headerNamed } from './statement/tokenizer.js';
export type { SectionRule, TokenizedStatement } from './statement/tokenizer.js';
export { classifyInstrument } from './statement/instruments.js';
export { SectionParserRegistry, createParserRegistry, defaultParserRegistry } from './parsers/registry.js';
export type { SectionParser, SectionParseResult, ParseContext } from './parsers/interface.js';
export { reconcile } from './reconcile/index.js';
export type { ReconcileInput, ReconcileOptions, ReconcileResult } from './reconcile/index.js';
export { writeSnapshots } from './history/writer.js';
export type { WriteOptions, WriteResult } from './history/writer.js';
export {
  getSnapshotHistory,
  getForexHistory,
  getSnapshotPositions,
  getTradeDetails,
  getSnapshotDates,
  getSnapshot,
} from './history/queries.js';
export { processStatement, processStatements } from './pipeline/index.js';
export type { ProcessOptions, ProcessingSummary, BatchResult, SectionSummary } from './pipeline/index.js';
export { StatementRequestSchema, extractStatementDate, handleStatementRequest, health } from './ingress/index.js';
export type { StatementRequest, StatementResponse, HealthResponse } from './ingress/index.js';
