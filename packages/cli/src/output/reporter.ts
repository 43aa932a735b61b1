/**
 * Console reporting of build events.
 *
 * describeEvent() is the plain-text rendering (also what the tests check);
 * ConsoleReporter colors it by tone and writes it to stderr, so stdout stays
 * free for command output such as `crucible builds`.
 */

import type { BuildEvent, LogSink } from '@crucible/kernel'
import { t, toneColor, type Tone } from './theme.js'

export interface EventLine {
  readonly tone: Tone
  readonly text: string
}

export function describeEvent(event: BuildEvent): EventLine {
  const image = event.detail ?? ''
  switch (event.kind) {
    case 'stage.skipped':
      return { tone: 'muted', text: `${event.stage ?? 'stage'}: ${image} present, skipped` }
    case 'stage.building':
      return { tone: 'info', text: `${event.stage ?? 'stage'}: building ${image}` }
    case 'stage.built':
      return { tone: 'success', text: `${event.stage ?? 'stage'}: built ${image}` }
    case 'stage.failed':
      return { tone: 'error', text: `${event.stage ?? 'stage'}: failed to build ${image}` }
    case 'step.started':
      return { tone: 'info', text: `${event.step ?? 'step'} …` }
    case 'step.completed':
      return { tone: 'success', text: `${event.step ?? 'step'} done` }
    case 'step.failed':
      return { tone: 'error', text: `${event.step ?? 'step'} failed: ${event.detail ?? ''}` }
    case 'layout.cleared':
      return { tone: 'warn', text: `removed ${event.detail ?? ''}` }
    case 'attr.malformed':
      return { tone: 'warn', text: `skipped %attr at ${event.detail ?? ''}` }
    case 'compose.started':
      return { tone: 'info', text: `composing from ${image}` }
    case 'compose.post-install':
      return { tone: 'info', text: 'ran /post-install.sh' }
    case 'compose.committed':
      return { tone: 'success', text: `committed ${image}` }
    case 'compose.failed':
      return { tone: 'error', text: `compose failed at ${event.detail ?? ''}` }
    case 'compose.cleanup-failed':
      return { tone: 'warn', text: `could not clean up: ${event.detail ?? ''}` }
  }
}

export class ConsoleReporter implements LogSink {
  constructor(private readonly write: (line: string) => void = (line) => process.stderr.write(line + '\n')) {}

  append(event: BuildEvent): void {
    const { tone, text } = describeEvent(event)
    this.write(`${t.dim('[')}${t.blueDim(`${event.vendor}/${event.release}`)}${t.dim(']')} ${toneColor(tone)(text)}`)
  }
}
