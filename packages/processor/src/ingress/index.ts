import { z } from 'zod';
import type { Database } from '../db/index.js';
import { describeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { processStatement } from '../pipeline/index.js';
import type { ProcessOptions, ProcessingSummary } from '../pipeline/index.js';
import { coerceDate } from '../statement/fields.js';

export const SERVICE_NAME = 'statement-ledger';

export const StatementRequestSchema = z.object({
  csv_content: z.string().min(1, 'csv_content must not be empty'),
  /** Mail subject; its last word is the statement date, e.g. `Daily Activity 01/16/2025`. */
  subject: z.string(),
  filename: z.string().optional(),
  account_id: z.string().min(1).optional(),
});

export type StatementRequest = z.infer<typeof StatementRequestSchema>;

export interface StatementResponse {
  status: 'success' | 'error';
  message: string;
  error?: string;
  summary?: ProcessingSummary;
}

export interface HealthResponse {
  status: 'healthy';
  service: typeof SERVICE_NAME;
}

export interface IngressOptions extends ProcessOptions {
  /** Clock for the ingestion timestamp. */
  now?: () => Date;
}

const EIGHT_DIGITS = /^\d{8}$/;

// Candidate date tokens in statement file names, tried in order:
//   U1234567_20250116.csv, daily_csv.U1234567.20250116.csv, statement.20250116
const FILENAME_PATTERNS: ((name: string) => string | undefined)[] = [
  (name) => name.split('.')[0]?.split('_').at(-1),
  (name) => name.split('.')[2],
  (name) => name.split('.')[1],
];

/**
 * Statement date as `yyyy-MM-dd`: the subject's last word as `MM/dd/yyyy`,
 * else an 8-digit `yyyyMMdd` token from the file name.
 */
export function extractStatementDate(subject: string, filename?: string): string | undefined {
  const lastWord = subject.trim().split(/\s+/).at(-1);
  const fromSubject = coerceDate(lastWord, ['MM/dd/yyyy']);
  if (fromSubject.ok && fromSubject.value) return fromSubject.value;

  if (!filename) return undefined;
  const base = filename.split(/[\\/]/).at(-1) ?? filename;
  for (const pattern of FILENAME_PATTERNS) {
    const token = pattern(base);
    if (!token || !EIGHT_DIGITS.test(token)) continue;
    const fromName = coerceDate(token, ['yyyyMMdd']);
    if (fromName.ok && fromName.value) return fromName.value;
  }
  return undefined;
}

/**
 * Validate a statement request, work out its date and run it through the
 * pipeline. Never throws: every failure comes back as `status: 'error'`.
 */
export function handleStatementRequest(
  db: Database,
  payload: unknown,
  options: IngressOptions = {},
): StatementResponse {
  const logger = (options.logger ?? silentLogger).child('ingress');

  const parsed = StatementRequestSchema.safeParse(payload);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    logger.warn('request rejected', { error: problems });
    return { status: 'error', message: 'Invalid request', error: problems };
  }

  const request = parsed.data;
  const date = extractStatementDate(request.subject, request.filename);
  if (!date) {
    const error = `No statement date in subject "${request.subject}"${request.filename ? ` or file name "${request.filename}"` : ''}`;
    logger.warn('request rejected', { error });
    return { status: 'error', message: 'Invalid request', error };
  }

  try {
    const summary = processStatement(
      db,
      {
        text: request.csv_content,
        metadata: {
          accountId: request.account_id,
          periodStart: date,
          periodEnd: date,
          ingestedAt: (options.now ?? (() => new Date()))().toISOString(),
          source: request.filename ?? request.subject,
        },
      },
      options,
    );

    if (summary.status === 'failed') {
      return {
        status: 'error',
        message: 'Failed to process statement',
        error: summary.error?.message,
        summary,
      };
    }
    return { status: 'success', message: 'Statement processed successfully', summary };
  } catch (err) {
    logger.error('Error processing statement', { error: describeError(err) });
    return { status: 'error', message: 'Failed to process statement', error: describeError(err) };
  }
}

export function health(): HealthResponse {
  return { status: 'healthy', service: SERVICE_NAME };
}
