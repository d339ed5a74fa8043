/**
 * Confirmation Gate
 *
 * Decides whether a proposed pairing is committed. Non-interactive runs
 * accept everything; interactive runs print the pairing and wait for an
 * answer, the only point where a run blocks.
 */

import { createInterface } from 'readline/promises';
import type { ReportWriter } from '../utils';
import { formatDay, logger } from '../utils';
import { AFFIRMATIVE_ANSWER, CONFIRM_QUESTION, DOCUMENT_LABELS, SUMMARY_RULE } from './constants';
import { formatAmount } from './runReport';
import type { ConfirmationGate, MatchProposal } from './types';

/**
 * Asks one question and resolves with the raw answer.
 */
export type Ask = (question: string) => Promise<string>;

export const acceptAll: ConfirmationGate = () => Promise.resolve(true);

/**
 * Human-readable description of a proposal, one entry per line.
 */
export function describeProposal(proposal: MatchProposal): string[] {
  const { payment, document } = proposal;
  const label = DOCUMENT_LABELS[document.kind].singular;

  const lines = [
    SUMMARY_RULE,
    'Potential match found:',
    '  Transaction details:',
    `    Description: ${payment.transaction.description}`,
    `    Date: ${formatDay(payment.date)}`,
    `    Amount: ${formatAmount(payment.amount)}`,
    `  ${label} details:`,
    `    ID: ${document.id}`,
  ];
  if (document.billingId) {
    lines.push(`    Billing ID: ${document.billingId}`);
  }
  lines.push(
    `    Company: ${document.ownerName ?? 'N/A'}`,
    `    Date: ${formatDay(document.postedDate)}`,
    `    Amount: ${formatAmount(document.total)}`
  );

  return lines;
}

export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === AFFIRMATIVE_ANSWER;
}

export function createInteractiveGate(ask: Ask, writer: ReportWriter): ConfirmationGate {
  return async (proposal: MatchProposal): Promise<boolean> => {
    for (const line of describeProposal(proposal)) {
      writer.line(line);
    }
    return isAffirmative(await ask(CONFIRM_QUESTION));
  };
}

/**
 * Terminal prompt, on stdin/stdout unless other streams are given.
 * Call `close` when the run is over.
 *
 * Once the input ends every question, including one already waiting,
 * is answered with an empty string, which rejects the pairing.
 */
export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): { ask: Ask; close: () => void } {
  const rl = createInterface({ input, output });
  const waiting = new Set<(answer: string) => void>();
  let closed = false;

  rl.on('close', () => {
    if (!closed) {
      closed = true;
      logger.warn('Input closed; remaining pairings are rejected');
    }
    for (const settle of waiting) {
      settle('');
    }
    waiting.clear();
  });

  const ask: Ask = (question: string) => {
    if (closed) {
      return Promise.resolve('');
    }

    return new Promise<string>((resolve, reject) => {
      const settle = (answer: string): void => {
        waiting.delete(settle);
        resolve(answer);
      };
      waiting.add(settle);

      rl.question(question).then(settle, (error: unknown) => {
        waiting.delete(settle);
        if (closed) {
          resolve('');
        } else {
          reject(error);
        }
      });
    });
  };

  return {
    ask,
    close: () => {
      closed = true;
      rl.close();
    },
  };
}
