/**
 * Tapline — Config Types
 */

export const NAMED_COLORS = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'gray',
  'darkgray',
  'lightred',
  'lightgreen',
  'lightyellow',
  'lightblue',
  'lightmagenta',
  'lightcyan',
  'white',
] as const

export type NamedColor = (typeof NAMED_COLORS)[number]

export type RgbColor = {
  readonly r: number
  readonly g: number
  readonly b: number
}

/** `reset` restores the terminal's default color */
export type Color = 'reset' | NamedColor | RgbColor

export const MODIFIERS = [
  'bold',
  'dim',
  'italic',
  'underlined',
  'slow_blink',
  'rapid_blink',
  'reversed',
  'hidden',
  'crossed_out',
] as const

export type Modifier = (typeof MODIFIERS)[number]

export type Style = {
  readonly fg?: Color
  readonly bg?: Color
  readonly modifiers: ReadonlySet<Modifier>
}

/** Named UI elements → style */
export type Theme = Readonly<Record<string, Style>>

export type Config = {
  readonly default_language: string
  readonly default_lexer: string
  readonly max_misalignment: number
  readonly theme: Theme
}
