/**
 * Tapline — Theme
 *
 * Built-in styles for the CLI's own output. Any of these can be
 * overridden from the [theme] table of config.toml.
 */

import { parseStyle } from '../config/style.js'
import type { Style, Theme } from '../config/types.js'
import { themeStyle } from './render.js'

export const BUILTIN_STYLES = {
  heading: 'lightmagenta;bold',
  label: 'lightcyan',
  muted: 'darkgray',
  error: 'lightred;bold',
  sample: 'none',
} as const

export type BuiltinStyleName = keyof typeof BUILTIN_STYLES

export function builtinStyle(name: BuiltinStyleName): Style {
  const result = parseStyle(BUILTIN_STYLES[name])
  if (!result.ok) throw result.error
  return result.value
}

/** The style for `name`: the config's [theme] entry if present, else the built-in */
export function resolveStyle(theme: Theme, name: BuiltinStyleName): Style {
  return themeStyle(theme, name, builtinStyle(name))
}
