// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';
  LOG_FILE: string;
}

/**
 * Processing mode selected on the command line.
 * - ar: customer invoices against the receivable account
 * - ap: vendor bills against the payable account
 */
export type MatchMode = 'ar' | 'ap';

/**
 * Validated options for one matching run.
 */
export interface MatchRunOptions {
  ledgerPath: string;
  paymentAccountPath: string;
  mode: MatchMode;
  controlAccountPath: string;
  daysBefore?: number;
  daysAfter?: number;
  dryRun: boolean;
  confirm: boolean;
}

// Run outcome at the process boundary
export type RunOutcome =
  | { status: 'success'; documentsFound: number; matchCount: number; saved: boolean }
  | { status: 'configuration-error'; message: string }
  | { status: 'session-error'; message: string };
