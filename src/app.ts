import { Command, Option } from 'commander';
import { z } from 'zod';
import type { MatchRunOptions, RunOutcome } from './types';
import type { ReportWriter } from './utils';

export const VERSION = '1.0.0';

const dayCount = z
  .string()
  .regex(/^-?\d+$/, 'must be a whole number of days')
  .transform(Number)
  .optional();

// Keys are the flag names as commander stores them
const rawOptionsSchema = z.object({
  gnucash_file: z.string().min(1, 'must not be empty'),
  payment_account: z.string().min(1, 'must not be empty'),
  mode: z.enum(['ar', 'ap']),
  ar_ap_account: z.string().min(1, 'must not be empty'),
  days_before: dayCount,
  days_after: dayCount,
  dry_run: z.boolean().default(false),
  confirm: z.boolean().default(false),
});

/**
 * Validates commander's option bag into run options.
 *
 * @returns The options, or the list of problems found
 */
export function parseRunOptions(
  raw: unknown
): { success: true; options: MatchRunOptions } | { success: false; errors: string[] } {
  const parsed = rawOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      errors: parsed.error.errors.map((issue) => `--${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const opts = parsed.data;
  return {
    success: true,
    options: {
      ledgerPath: opts.gnucash_file,
      paymentAccountPath: opts.payment_account,
      mode: opts.mode,
      controlAccountPath: opts.ar_ap_account,
      daysBefore: opts.days_before,
      daysAfter: opts.days_after,
      dryRun: opts.dry_run,
      confirm: opts.confirm,
    },
  };
}

/**
 * Prints a failed outcome and maps it to the process exit code.
 */
export function reportOutcome(outcome: RunOutcome, writer: ReportWriter): number {
  switch (outcome.status) {
    case 'success':
      return 0;
    case 'configuration-error':
      writer.error(`Error: ${outcome.message}`);
      return 1;
    case 'session-error':
      writer.error(outcome.message);
      return 1;
  }
}

/**
 * Create and configure the command-line program.
 *
 * @param run - Invoked with validated options
 */
export const createProgram = (run: (options: MatchRunOptions) => Promise<void>): Command => {
  const program: Command = new Command();

  program
    .name('ledger-payment-matcher')
    .description('Automatically match payments to invoices or bills in a GnuCash file.')
    .version(VERSION)
    .requiredOption('--gnucash_file <path>', 'Path to the GnuCash file (SQLite backend).')
    .requiredOption(
      '--payment_account <path>',
      "Full name of the payment account (e.g., 'Assets:Current Assets:Checking Account')."
    )
    .addOption(
      new Option(
        '--mode <mode>',
        "Processing mode: 'ar' for invoices/receivables or 'ap' for bills/payables."
      )
        .choices(['ar', 'ap'])
        .makeOptionMandatory()
    )
    .requiredOption(
      '--ar_ap_account <path>',
      'Full name of the Accounts Receivable or Accounts Payable account.'
    )
    .option(
      '--days_before <days>',
      'Number of days the document date can be after the payment date. ' +
        'For date filtering, both --days_before and --days_after must be specified.'
    )
    .option(
      '--days_after <days>',
      'Number of days the document date can be before the payment date. ' +
        'For date filtering, both --days_before and --days_after must be specified.'
    )
    .option('--dry_run', 'Perform a dry run without saving any changes.')
    .option('--confirm', 'Confirm each match manually.')
    .action(async (raw: unknown) => {
      const parsed = parseRunOptions(raw);
      if (!parsed.success) {
        program.error(`error: invalid options\n  ${parsed.errors.join('\n  ')}`);
      }
      await run(parsed.options);
    });

  return program;
};

export default createProgram;
