/**
 * Crucible Runtime Host — File-backed Build Event Sink
 *
 * Implements the LogSink interface from @crucible/kernel by appending one
 * JSONL line per event to `<home>/logs/events.jsonl`.
 *
 * The sink is synchronous: the line is on disk before the build proceeds,
 * so a crash mid-step still leaves the step.started record.
 */

import type { BuildEvent, LogSink } from '@crucible/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const EVENT_LOG = 'events.jsonl';

export class FileLogSink implements LogSink {
  constructor(private readonly stateIO: StateIO) {}

  append(event: BuildEvent): void {
    const line = JSON.stringify({
      event_id: ulid(),
      timestamp: event.timestamp,
      kind: event.kind,
      stage: event.stage ?? null,
      step: event.step ?? null,
      vendor: event.vendor,
      release: event.release,
      detail: event.detail ?? null,
    });
    this.stateIO.appendLine(EVENT_LOG, line);
  }
}
