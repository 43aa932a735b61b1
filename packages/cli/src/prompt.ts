/**
 * Operator prompts over node:readline. Only used when stdin is a TTY.
 */

import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';

export function isInteractive(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

export async function ask(question: string, fallback?: string): Promise<string> {
  const rl = readline.createInterface({ input, output });
  let answer = '';
  try {
    const suffix = fallback === undefined ? '' : ` [${fallback}]`;
    answer = await rl.question(`${question}${suffix}: `);
  } finally {
    rl.close();
  }
  const trimmed = answer.trim();
  return trimmed === '' && fallback !== undefined ? fallback : trimmed;
}

export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({ input, output });
  let answer = '';
  try {
    answer = await rl.question(`${question} [y/N] `);
  } finally {
    rl.close();
  }
  return answer.trim().toLowerCase() === 'y';
}
