/**
 * Confirmation strategies for destructive operations
 */

import * as readline from 'readline';

/**
 * Ask a yes/no question, resolve true only on an explicit yes
 */
export type ConfirmFn = (question: string) => Promise<boolean>;

export const CONFIRM_CHOICES = ['yes', 'no'] as const;

/**
 * Map an answer to a decision. Blank means the default (no); undefined means ask again.
 */
export function parseConfirmation(answer: string): boolean | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === '' || normalized === 'no') {
    return false;
  }
  if (normalized === 'yes') {
    return true;
  }
  return undefined;
}

export function formatQuestion(question: string): string {
  return `${question} [${CONFIRM_CHOICES.join('/')}] (no): `;
}

/**
 * Prompt on the controlling terminal until the answer is one of the two choices
 */
export const terminalConfirm: ConfirmFn = async (question) => {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const ask = (prompt: string): Promise<string> => {
    return new Promise((resolve) => {
      rl.question(prompt, resolve);
    });
  };

  try {
    for (;;) {
      const decision = parseConfirmation(await ask(formatQuestion(question)));
      if (decision !== undefined) {
        return decision;
      }
      process.stdout.write(`Please answer ${CONFIRM_CHOICES.join(' or ')}.\n`);
    }
  } finally {
    rl.close();
  }
};

export const alwaysConfirm: ConfirmFn = async () => true;

export const neverConfirm: ConfirmFn = async () => false;
