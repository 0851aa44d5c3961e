/**
 * Tapline — Color Parser
 *
 * Turns a color token from the config into a Color:
 *   'reset' | one of the 16 terminal color names | six hex digits (rrggbb)
 */

import { StyleParseError } from './errors.js'
import type { ParseResult } from './errors.js'
import { NAMED_COLORS } from './types.js'
import type { Color, NamedColor } from './types.js'

export const COLOR_EXPECTED = 'a color name or hexadecimal color code'

const HEX_PAIR = /^[0-9a-fA-F]{2}$/

const NAMES: ReadonlySet<string> = new Set(NAMED_COLORS)

function isNamedColor(value: string): value is NamedColor {
  return NAMES.has(value)
}

/** Parse a color name or hexadecimal color code. Names are case-sensitive. */
export function parseColor(value: string): ParseResult<Color> {
  if (value === 'reset' || isNamedColor(value)) {
    return { ok: true, value }
  }

  if (value.length !== 6) {
    return {
      ok: false,
      error: new StyleParseError('unrecognized-color', value, COLOR_EXPECTED),
    }
  }

  const channels: number[] = []
  for (let i = 0; i < 6; i += 2) {
    const pair = value.slice(i, i + 2)
    if (!HEX_PAIR.test(pair)) {
      return {
        ok: false,
        error: new StyleParseError(
          'invalid-color',
          value,
          COLOR_EXPECTED,
          `color code ${JSON.stringify(value)} was not valid hexadecimal (bad byte ${JSON.stringify(pair)})`,
        ),
      }
    }
    channels.push(parseInt(pair, 16))
  }

  const [r, g, b] = channels
  return { ok: true, value: { r, g, b } }
}
