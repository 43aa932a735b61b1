/**
 * In-process ExecAdapter that records every call and answers from a
 * handler. No subprocess is started.
 */

import type { ExecAdapter, ExecOptions, ExecResult } from '@crucible/kernel';

export interface RecordedCall {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  readonly options: ExecOptions;
}

export type ExecHandler = (command: string, args: ReadonlyArray<string>) => Partial<ExecResult>;

export class RecordingExec implements ExecAdapter {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: ExecHandler = () => ({})) {}

  async run(command: string, args: ReadonlyArray<string>, options: ExecOptions = {}): Promise<ExecResult> {
    this.calls.push({ command, args: [...args], options });
    const result = this.handler(command, args);
    return { exitCode: 0, stdout: '', stderr: '', ...result };
  }

  /** `command arg arg…` of every call, in order. */
  commandLines(): string[] {
    return this.calls.map((call) => [call.command, ...call.args].join(' '));
  }
}
