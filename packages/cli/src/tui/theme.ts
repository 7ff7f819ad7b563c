import chalk, { type ChalkInstance } from 'chalk'
import { Urgency } from '@ddm-status/kernel'

export const t = {
  blue:       chalk.hex('#4FC3F7'),
  blueDim:    chalk.hex('#0277BD'),
  text:       chalk.hex('#C8C8C0'),
  white:      chalk.hex('#F2F2EC'),
  dim:        chalk.hex('#444444'),
  muted:      chalk.hex('#666666'),
  amber:      chalk.hex('#D4880A'),
  orange:     chalk.hex('#F57C00'),
  green:      chalk.hex('#81C784'),
  red:        chalk.hex('#CF6679'),
} as const

/** Hex values of the palette, for Ink's `color` props. */
export const hex = {
  blue:   '#4FC3F7',
  blueDim: '#0277BD',
  text:   '#C8C8C0',
  white:  '#F2F2EC',
  dim:    '#444444',
  muted:  '#666666',
  border: '#242424',
  amber:  '#D4880A',
  orange: '#F57C00',
  green:  '#81C784',
  red:    '#CF6679',
} as const

const _urgencyHex: Record<Urgency, string> = {
  [Urgency.Critical]: hex.red,
  [Urgency.High]:     hex.orange,
  [Urgency.Elevated]: hex.amber,
  [Urgency.Notice]:   hex.blue,
  [Urgency.Unknown]:  hex.muted,
  [Urgency.Ok]:       hex.green,
}

export const urgencyHex = (urgency: Urgency): string => _urgencyHex[urgency]

export const urgencyColor = (urgency: Urgency): ChalkInstance => chalk.hex(_urgencyHex[urgency])
