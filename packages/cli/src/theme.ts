import chalk, { type ChalkInstance } from 'chalk'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueBright: chalk.hex('#81D4FA'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

const _eventColors: Record<string, ChalkInstance> = {
  Registered:           t.blue,
  DistributionAdded:    t.green,
  DistributionRemoved:  t.amber,
  Instantiated:         t.blueBright,
  OwnershipTransferred: t.red,
}

export const eventColor = (name: string | undefined): ChalkInstance =>
  (name === undefined ? undefined : _eventColors[name]) ?? t.muted
