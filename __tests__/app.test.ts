import { Command } from 'commander';
import { createProgram, parseRunOptions, reportOutcome } from '../src/app';
import type { MatchRunOptions } from '../src/types';
import { createRecordingWriter } from './helpers/inMemoryBook';

describe('App', () => {
  const requiredArgs = [
    '--gnucash_file', 'books.gnucash',
    '--payment_account', 'Assets:Current Assets:Checking Account',
    '--mode', 'ar',
    '--ar_ap_account', 'Assets:Accounts Receivable',
  ];

  const expectedOptions: MatchRunOptions = {
    ledgerPath: 'books.gnucash',
    paymentAccountPath: 'Assets:Current Assets:Checking Account',
    mode: 'ar',
    controlAccountPath: 'Assets:Accounts Receivable',
    daysBefore: undefined,
    daysAfter: undefined,
    dryRun: false,
    confirm: false,
  };

  // ============================================
  // Option parsing
  // ============================================

  describe('parseRunOptions', () => {
    const raw = {
      gnucash_file: 'books.gnucash',
      payment_account: 'Assets:Current Assets:Checking Account',
      mode: 'ar',
      ar_ap_account: 'Assets:Accounts Receivable',
    };

    it('should map flags to run options with defaults', () => {
      expect(parseRunOptions(raw)).toEqual({ success: true, options: expectedOptions });
    });

    it('should convert day bounds to numbers', () => {
      const result = parseRunOptions({ ...raw, days_before: '10', days_after: '-2', dry_run: true });

      expect(result).toEqual({
        success: true,
        options: { ...expectedOptions, daysBefore: 10, daysAfter: -2, dryRun: true },
      });
    });

    it('should reject non-numeric day bounds', () => {
      expect(parseRunOptions({ ...raw, days_before: 'ten' })).toEqual({
        success: false,
        errors: ['--days_before: must be a whole number of days'],
      });
    });

    it('should reject an unknown mode', () => {
      const result = parseRunOptions({ ...raw, mode: 'gl' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0].startsWith('--mode: ')).toBe(true);
      }
    });

    it('should reject an empty account path', () => {
      expect(parseRunOptions({ ...raw, payment_account: '' })).toEqual({
        success: false,
        errors: ['--payment_account: must not be empty'],
      });
    });
  });

  // ============================================
  // Outcome reporting
  // ============================================

  describe('reportOutcome', () => {
    it('should return 0 for a successful run', () => {
      const writer = createRecordingWriter();

      const code = reportOutcome({ status: 'success', documentsFound: 2, matchCount: 1, saved: true }, writer);

      expect(code).toBe(0);
      expect(writer.errors).toEqual([]);
    });

    it('should print a session error as is and return 1', () => {
      const writer = createRecordingWriter();

      const code = reportOutcome({ status: 'session-error', message: 'Error saving GnuCash file: disk full' }, writer);

      expect(code).toBe(1);
      expect(writer.errors).toEqual(['Error saving GnuCash file: disk full']);
    });

    it('should prefix a configuration error and return 1', () => {
      const writer = createRecordingWriter();

      const code = reportOutcome(
        { status: 'configuration-error', message: "Could not find payment account 'Assets:Savings'" },
        writer
      );

      expect(code).toBe(1);
      expect(writer.errors).toEqual(["Error: Could not find payment account 'Assets:Savings'"]);
    });
  });

  // ============================================
  // Command line
  // ============================================

  describe('createProgram', () => {
    const setup = () => {
      const run = jest.fn<Promise<void>, [MatchRunOptions]>(() => Promise.resolve());
      const program: Command = createProgram(run)
        .exitOverride()
        .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
      return { run, program };
    };

    it('should run with the parsed options', async () => {
      const { run, program } = setup();

      await program.parseAsync(requiredArgs, { from: 'user' });

      expect(run).toHaveBeenCalledWith(expectedOptions);
    });

    it('should pass optional flags through', async () => {
      const { run, program } = setup();

      await program.parseAsync(
        [...requiredArgs, '--days_before', '5', '--days_after', '15', '--dry_run', '--confirm'],
        { from: 'user' }
      );

      expect(run).toHaveBeenCalledWith({
        ...expectedOptions,
        daysBefore: 5,
        daysAfter: 15,
        dryRun: true,
        confirm: true,
      });
    });

    it('should fail when a required option is missing', async () => {
      const { run, program } = setup();

      await expect(program.parseAsync(requiredArgs.slice(2), { from: 'user' })).rejects.toMatchObject({
        code: 'commander.missingMandatoryOptionValue',
      });
      expect(run).not.toHaveBeenCalled();
    });

    it('should fail for a mode outside ar and ap', async () => {
      const { run, program } = setup();
      const args = requiredArgs.map((arg) => (arg === 'ar' ? 'gl' : arg));

      await expect(program.parseAsync(args, { from: 'user' })).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
      expect(run).not.toHaveBeenCalled();
    });

    it('should fail for non-numeric day bounds', async () => {
      const { run, program } = setup();

      await expect(
        program.parseAsync([...requiredArgs, '--days_before', 'soon'], { from: 'user' })
      ).rejects.toMatchObject({ code: 'commander.error', exitCode: 1 });
      expect(run).not.toHaveBeenCalled();
    });
  });
});
