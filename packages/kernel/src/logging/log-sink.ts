/**
 * Crucible Kernel — Log Sink Interface
 *
 * The kernel owns the BuildEvent shape and this interface. Concrete sinks
 * (the JSONL file sink, the console reporter) live outside the kernel and
 * are injected; the kernel never writes to disk or the terminal itself.
 */

import type { BuildStage } from '../types/stage.js';
import type { BuildStepId } from '../types/job.js';

export type BuildEventKind =
  | 'stage.skipped'
  | 'stage.building'
  | 'stage.built'
  | 'stage.failed'
  | 'step.started'
  | 'step.completed'
  | 'step.failed'
  | 'layout.cleared'
  | 'attr.malformed'
  | 'compose.started'
  | 'compose.post-install'
  | 'compose.committed'
  | 'compose.failed'
  | 'compose.cleanup-failed';

export interface BuildEvent {
  readonly kind: BuildEventKind;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly vendor: string;
  readonly release: string;
  readonly stage?: BuildStage | undefined;
  readonly step?: BuildStepId | undefined;
  readonly detail?: string | undefined;
}

/**
 * Receives build events. append() must not throw for a well-formed event.
 */
export interface LogSink {
  append(event: BuildEvent): void;
}

/** Forward every event to each sink in order. */
export function teeSinks(...sinks: ReadonlyArray<LogSink>): LogSink {
  return {
    append(event: BuildEvent): void {
      for (const sink of sinks) {
        sink.append(event);
      }
    },
  };
}
