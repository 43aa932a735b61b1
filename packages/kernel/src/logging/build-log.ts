/**
 * Crucible Kernel — Build Logger
 *
 * Stamps events with a timestamp and the (vendor, release) of the run, then
 * forwards them to the injected LogSink. Without a sink, record() is a
 * no-op, which is what the tests use.
 */

import type { BuildEvent, LogSink } from './log-sink.js';

export type BuildEventInput = Omit<BuildEvent, 'timestamp' | 'vendor' | 'release'>;

export class BuildLogger {
  constructor(
    private readonly sink?: LogSink,
    private readonly now: () => Date = () => new Date(),
  ) {}

  record(vendor: string, release: string, event: BuildEventInput): void {
    this.sink?.append({
      ...event,
      timestamp: this.now().toISOString(),
      vendor,
      release,
    });
  }
}
