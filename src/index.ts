#!/usr/bin/env node
import { createProgram, reportOutcome } from './app';
import { createInteractiveGate, createTerminalPrompt } from './matching';
import { runReconciliation } from './services';
import type { MatchRunOptions } from './types';
import { consoleReportWriter, logger } from './utils';

const run = async (options: MatchRunOptions): Promise<void> => {
  const prompt = options.confirm ? createTerminalPrompt() : null;

  try {
    const outcome = await runReconciliation(options, {
      writer: consoleReportWriter,
      interactiveGate: prompt ? createInteractiveGate(prompt.ask, consoleReportWriter) : undefined,
    });
    process.exitCode = reportOutcome(outcome, consoleReportWriter);
  } finally {
    prompt?.close();
  }
};

const main = async (): Promise<void> => {
  try {
    await createProgram(run).parseAsync(process.argv);
  } catch (error) {
    logger.error(error instanceof Error ? error : String(error));
    process.exitCode = 1;
  }
};

void main();
