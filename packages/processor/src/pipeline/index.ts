import type { ProcessorConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import type { Database } from '../db/index.js';
import { PersistenceError, StructuralError } from '../errors.js';
import type { FieldWarning, ReconciliationWarning, Warning } from '../errors.js';
import { emptyWriteResult, writeSnapshots } from '../history/writer.js';
import type { WriteResult } from '../history/writer.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { accountDetails } from '../parsers/account-info/index.js';
import type { ParseContext } from '../parsers/interface.js';
import { defaultParserRegistry } from '../parsers/registry.js';
import type { SectionParserRegistry } from '../parsers/registry.js';
import { reconcile } from '../reconcile/index.js';
import { SECTION_RULES, tokenizeStatement } from '../statement/tokenizer.js';
import type { SectionRule } from '../statement/tokenizer.js';
import type {
  AccountField,
  CashReportEntry,
  ForexBalance,
  ParsedRecord,
  PortfolioSnapshot,
  PositionRecord,
  Section,
  SectionKind,
  StatementDocument,
  TradeRecord,
} from '../statement/types.js';

export interface ProcessOptions {
  config?: ProcessorConfig;
  registry?: SectionParserRegistry;
  rules?: readonly SectionRule[];
  logger?: Logger;
}

export interface SectionSummary {
  index: number;
  kind: SectionKind;
  name: string;
  lines: number;
  summaryLines: number;
  records: number;
  warnings: number;
}

export interface ProcessingError {
  code: string;
  message: string;
  /** The document itself needs a human look; retrying will not help. */
  reviewRequired: boolean;
  /** Nothing was written and the same document can be submitted again. */
  retryable: boolean;
}

export interface ProcessingSummary {
  status: 'success' | 'failed';
  accountId?: string;
  asOfDate: string;
  sections: {
    found: number;
    unknown: number;
    byKind: Partial<Record<SectionKind, number>>;
    detail: SectionSummary[];
  };
  records: { parsed: number; skipped: number };
  warnings: Warning[];
  reconciliationWarnings: number;
  snapshots: PortfolioSnapshot[];
  rows: WriteResult;
  error?: ProcessingError;
}

interface Collected {
  trades: TradeRecord[];
  positions: PositionRecord[];
  forexBalances: ForexBalance[];
  cashEntries: CashReportEntry[];
  accountFields: AccountField[];
}

function collect(records: readonly ParsedRecord[], into: Collected): void {
  for (const record of records) {
    switch (record.kind) {
      case 'trade': into.trades.push(record); break;
      case 'position': into.positions.push(record); break;
      case 'forex_balance': into.forexBalances.push(record); break;
      case 'cash_entry': into.cashEntries.push(record); break;
      case 'account_field': into.accountFields.push(record); break;
    }
  }
}

function emptySummary(asOfDate: string): ProcessingSummary {
  return {
    status: 'success',
    asOfDate,
    sections: { found: 0, unknown: 0, byKind: {}, detail: [] },
    records: { parsed: 0, skipped: 0 },
    warnings: [],
    reconciliationWarnings: 0,
    snapshots: [],
    rows: emptyWriteResult(),
  };
}

function failed(summary: ProcessingSummary, error: StructuralError | PersistenceError): ProcessingSummary {
  const structural = error instanceof StructuralError;
  return {
    ...summary,
    status: 'failed',
    snapshots: [],
    rows: emptyWriteResult(),
    error: {
      code: error.code,
      message: error.message,
      reviewRequired: structural,
      retryable: !structural,
    },
  };
}

/**
 * Run one statement through tokenize → parse → reconcile → write.
 *
 * Structural problems (unrecognized format, a missing expected section, no
 * account id) and write failures end the run with `status: 'failed'` and
 * nothing persisted. Everything else is reported as a warning and the
 * snapshot is written from whatever parsed cleanly.
 */
export function processStatement(
  db: Database,
  document: StatementDocument,
  options: ProcessOptions = {},
): ProcessingSummary {
  const config = options.config ?? DEFAULT_CONFIG;
  const registry = options.registry ?? defaultParserRegistry;
  const logger = (options.logger ?? silentLogger).child('pipeline');
  const { metadata } = document;
  const summary = emptySummary(metadata.periodEnd);

  try {
    const { sections, issues } = tokenizeStatement(document.text, options.rules ?? SECTION_RULES);
    summary.warnings.push(...issues);

    for (const section of sections) {
      summary.sections.byKind[section.kind] = (summary.sections.byKind[section.kind] ?? 0) + 1;
      if (section.kind === 'unknown') summary.sections.unknown++;
      else summary.sections.found++;
    }

    const missing = (metadata.expectedSections ?? []).filter((kind) => !summary.sections.byKind[kind]);
    if (missing.length > 0) {
      throw new StructuralError('missing_section', `Statement is missing expected section(s): ${missing.join(', ')}`);
    }

    const collected: Collected = { trades: [], positions: [], forexBalances: [], cashEntries: [], accountFields: [] };
    const fieldWarnings: FieldWarning[] = [];
    const detail = new Map<number, SectionSummary>();

    const parseSection = (section: Section, context: ParseContext): void => {
      const parser = section.kind === 'unknown' ? undefined : registry.get(section.kind);
      const result = parser ? parser.parse(section, context) : { records: [], warnings: [] };
      collect(result.records, collected);
      fieldWarnings.push(...result.warnings);
      summary.records.parsed += result.records.length;
      summary.records.skipped += result.warnings.length;
      detail.set(section.index, {
        index: section.index,
        kind: section.kind,
        name: section.name,
        lines: section.lines.length,
        summaryLines: section.summaryLines.length,
        records: result.records.length,
        warnings: result.warnings.length,
      });
    };

    // Account Information first: it can supply the account id and base
    // currency every other section's records are tagged with.
    const provisional: ParseContext = {
      accountId: metadata.accountId ?? '',
      asOfDate: metadata.periodEnd,
      baseCurrency: metadata.baseCurrency ?? config.baseCurrency,
      optionMultiplier: config.optionMultiplier,
    };
    for (const section of sections.filter((s) => s.kind === 'account_info')) {
      parseSection(section, provisional);
    }

    const info = accountDetails(collected.accountFields);
    const accountId = metadata.accountId ?? info.accountId;
    if (!accountId) {
      throw new StructuralError('missing_account', 'No account id in the request or the statement');
    }
    summary.accountId = accountId;

    const reconciliationWarnings: ReconciliationWarning[] = [];
    if (metadata.accountId && info.accountId && metadata.accountId !== info.accountId) {
      reconciliationWarnings.push({
        type: 'reconciliation',
        reason: 'account_mismatch',
        message: `Request names account ${metadata.accountId} but the statement names ${info.accountId}`,
        account_id: accountId,
      });
    }

    const context: ParseContext = {
      ...provisional,
      accountId,
      baseCurrency: metadata.baseCurrency ?? info.baseCurrency ?? config.baseCurrency,
    };
    for (const section of sections.filter((s) => s.kind !== 'account_info')) {
      parseSection(section, context);
    }
    summary.sections.detail = sections.flatMap((s) => detail.get(s.index) ?? []);

    const reconciled = reconcile(
      {
        accountId,
        asOfDate: metadata.periodEnd,
        baseCurrency: context.baseCurrency,
        trades: collected.trades,
        positions: collected.positions,
        forexBalances: collected.forexBalances,
        cashEntries: collected.cashEntries,
      },
      { consolidateAccounts: config.consolidateAccounts, forexTolerance: config.forexTolerance },
    );
    reconciliationWarnings.push(...reconciled.warnings);

    summary.warnings.push(...fieldWarnings, ...reconciliationWarnings);
    summary.reconciliationWarnings = reconciliationWarnings.length;
    summary.snapshots = reconciled.snapshots;

    const trades = config.consolidateAccounts
      ? collected.trades.map((t) => ({ ...t, accountId }))
      : collected.trades;

    summary.rows = writeSnapshots(db, reconciled.snapshots, trades, {
      ingestedAt: metadata.ingestedAt,
      statementDate: metadata.periodEnd,
      source: metadata.source,
      logger,
    });

    logger.info('statement processed', {
      account_id: accountId,
      as_of_date: metadata.periodEnd,
      sections: summary.sections.found,
      records: summary.records.parsed,
      warnings: summary.warnings.length,
    });
    return summary;
  } catch (err) {
    if (err instanceof StructuralError || err instanceof PersistenceError) {
      logger.warn('statement failed', { code: err.code, message: err.message, as_of_date: metadata.periodEnd });
      return failed(summary, err);
    }
    throw err;
  }
}

export interface BatchOptions extends ProcessOptions {
  signal?: AbortSignal;
}

export interface BatchResult {
  summaries: ProcessingSummary[];
  /** True when the signal fired before every document was processed. */
  aborted: boolean;
}

/**
 * Process documents one at a time, in order. An aborted signal stops the
 * batch between documents; a document already started always finishes.
 */
export async function processStatements(
  db: Database,
  documents: Iterable<StatementDocument> | AsyncIterable<StatementDocument>,
  options: BatchOptions = {},
): Promise<BatchResult> {
  const summaries: ProcessingSummary[] = [];
  for await (const document of documents) {
    if (options.signal?.aborted) return { summaries, aborted: true };
    summaries.push(processStatement(db, document, options));
  }
  return { summaries, aborted: false };
}
