/**
 * Error reporting for command actions.
 *
 * Every failure prints `[crucible <command>] <message>` to stderr and exits
 * with status 1. A failed external tool also shows the tail of its stderr.
 */

import { CrucibleError, ExternalToolError, messageOf } from '@crucible/kernel';
import { t } from './output/theme.js';

/** The innermost ExternalToolError in a cause chain, if any. */
export function toolFailure(err: unknown): ExternalToolError | null {
  let current: unknown = err;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof ExternalToolError) return current;
    current = current.cause;
  }
  return null;
}

export function failureLines(command: string, err: unknown): string[] {
  const lines = [`[crucible ${command}] ${messageOf(err)}`];
  const tool = toolFailure(err);
  if (tool !== null && tool.stderrTail.trim() !== '') {
    for (const line of tool.stderrTail.trimEnd().split('\n')) {
      lines.push(`  ${line}`);
    }
  }
  if (!(err instanceof CrucibleError) && err instanceof Error && err.stack !== undefined) {
    lines.push(err.stack);
  }
  return lines;
}

export function fail(command: string, err: unknown): never {
  const [headline = '', ...rest] = failureLines(command, err);
  // eslint-disable-next-line no-console
  console.error(t.red(headline));
  for (const line of rest) {
    // eslint-disable-next-line no-console
    console.error(t.muted(line));
  }
  process.exit(1);
}

/** Wrap a command action so any rejection goes through fail(). */
export function guarded<A extends unknown[]>(
  command: string,
  body: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await body(...args);
    } catch (err: unknown) {
      fail(command, err);
    }
  };
}
