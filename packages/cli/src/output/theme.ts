import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

export type Tone = 'info' | 'success' | 'warn' | 'error' | 'muted'

const _toneColors: Record<Tone, ChalkInstance> = {
  info:    t.blue,
  success: t.green,
  warn:    t.amber,
  error:   t.red,
  muted:   t.muted,
}

export const toneColor = (tone: Tone): ChalkInstance => _toneColors[tone]
