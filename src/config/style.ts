/**
 * Tapline — Style Parser
 *
 * Compact style strings used by the theme:
 *
 *   fg[:bg][;modifier[;modifier...]]
 *
 *   'none'                       → no colors, no modifiers
 *   'black:white'                → black on white
 *   '00ff00:000000;bold;italic'  → rgb colors, bold + italic
 *
 * 'none' or an empty string leaves a color unset.
 */

import { parseColor } from './color.js'
import { StyleParseError } from './errors.js'
import type { ParseResult } from './errors.js'
import { MODIFIERS } from './types.js'
import type { Color, Modifier, Style } from './types.js'

export const MODIFIER_EXPECTED = 'a style modifier'

const MODIFIER_NAMES: ReadonlySet<string> = new Set(MODIFIERS)

function isModifier(value: string): value is Modifier {
  return MODIFIER_NAMES.has(value)
}

/** Split on the first occurrence of `sep`; `fallback` is the tail when `sep` is absent */
function splitOnce(value: string, sep: string, fallback: string): [string, string] {
  const idx = value.indexOf(sep)
  return idx === -1 ? [value, fallback] : [value.slice(0, idx), value.slice(idx + 1)]
}

/** Split on `sep`, dropping the empty piece a trailing separator leaves behind */
function splitTerminator(value: string, sep: string): string[] {
  if (value === '') return []
  const parts = value.split(sep)
  if (parts[parts.length - 1] === '') parts.pop()
  return parts
}

function parseOptionalColor(value: string): ParseResult<Color | undefined> {
  if (value === 'none' || value === '') return { ok: true, value: undefined }
  return parseColor(value)
}

/** Returns `style` with `modifier` added. Adding one that is already set is a no-op. */
export function addModifier(style: Style, modifier: Modifier): Style {
  if (style.modifiers.has(modifier)) return style
  return { ...style, modifiers: new Set([...style.modifiers, modifier]) }
}

/** Parse a style string. The returned style is frozen. */
export function parseStyle(value: string): ParseResult<Style> {
  const [colors, modifiers] = splitOnce(value, ';', '')
  const [fgToken, bgToken] = splitOnce(colors, ':', 'none')

  const fg = parseOptionalColor(fgToken)
  if (!fg.ok) return fg
  const bg = parseOptionalColor(bgToken)
  if (!bg.ok) return bg

  let style: Style = { modifiers: new Set<Modifier>() }
  if (fg.value !== undefined) style = { ...style, fg: fg.value }
  if (bg.value !== undefined) style = { ...style, bg: bg.value }

  for (const token of splitTerminator(modifiers, ';')) {
    if (!isModifier(token)) {
      return {
        ok: false,
        error: new StyleParseError('invalid-modifier', token, MODIFIER_EXPECTED),
      }
    }
    style = addModifier(style, token)
  }

  return { ok: true, value: Object.freeze(style) }
}
