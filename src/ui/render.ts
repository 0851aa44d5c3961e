/**
 * Tapline — Style Renderer
 *
 * Applies a parsed Style to text as ANSI escapes using chalk.
 */

import chalk from 'chalk'
import type { BackgroundColorName, ChalkInstance, ForegroundColorName, ModifierName } from 'chalk'
import type { Color, Modifier, NamedColor, Style, Theme } from '../config/types.js'

const FOREGROUND: Record<NamedColor, ForegroundColorName> = {
  black: 'black',
  red: 'red',
  green: 'green',
  yellow: 'yellow',
  blue: 'blue',
  magenta: 'magenta',
  cyan: 'cyan',
  gray: 'white',              // SGR 37
  darkgray: 'blackBright',    // SGR 90
  lightred: 'redBright',
  lightgreen: 'greenBright',
  lightyellow: 'yellowBright',
  lightblue: 'blueBright',
  lightmagenta: 'magentaBright',
  lightcyan: 'cyanBright',
  white: 'whiteBright',       // SGR 97
}

const BACKGROUND: Record<NamedColor, BackgroundColorName> = {
  black: 'bgBlack',
  red: 'bgRed',
  green: 'bgGreen',
  yellow: 'bgYellow',
  blue: 'bgBlue',
  magenta: 'bgMagenta',
  cyan: 'bgCyan',
  gray: 'bgWhite',
  darkgray: 'bgBlackBright',
  lightred: 'bgRedBright',
  lightgreen: 'bgGreenBright',
  lightyellow: 'bgYellowBright',
  lightblue: 'bgBlueBright',
  lightmagenta: 'bgMagentaBright',
  lightcyan: 'bgCyanBright',
  white: 'bgWhiteBright',
}

// chalk has no blink styles
const CHALK_MODIFIER: Record<Exclude<Modifier, 'slow_blink' | 'rapid_blink'>, ModifierName> = {
  bold: 'bold',
  dim: 'dim',
  italic: 'italic',
  underlined: 'underline',
  reversed: 'inverse',
  hidden: 'hidden',
  crossed_out: 'strikethrough',
}

function withColor(painter: ChalkInstance, color: Color, layer: 'fg' | 'bg'): ChalkInstance {
  if (color === 'reset') return painter
  if (typeof color === 'object') {
    return layer === 'fg'
      ? painter.rgb(color.r, color.g, color.b)
      : painter.bgRgb(color.r, color.g, color.b)
  }
  return layer === 'fg' ? painter[FOREGROUND[color]] : painter[BACKGROUND[color]]
}

/** Render `text` with `style`. Pass a chalk instance to force a color level. */
export function renderStyled(text: string, style: Style, painter: ChalkInstance = chalk): string {
  let p = painter
  if (style.fg !== undefined) p = withColor(p, style.fg, 'fg')
  if (style.bg !== undefined) p = withColor(p, style.bg, 'bg')

  let blink = ''
  for (const modifier of style.modifiers) {
    if (modifier === 'slow_blink') blink += '\x1b[5m'
    else if (modifier === 'rapid_blink') blink += '\x1b[6m'
    else p = p[CHALK_MODIFIER[modifier]]
  }

  const out = p(text)
  if (!blink || painter.level === 0 || !text) return out
  return `${blink}${out}\x1b[25m`
}

/** Look up a theme entry, falling back to `fallback` when the theme doesn't set it */
export function themeStyle(theme: Theme, name: string, fallback: Style): Style {
  return Object.hasOwn(theme, name) ? theme[name] : fallback
}
