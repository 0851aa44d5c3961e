/**
 * Tapline — Config Defaults
 */

import type { Config, Modifier, Style } from './types.js'

export const DEFAULT_STYLE: Style = Object.freeze({
  modifiers: new Set<Modifier>(),
})

export const DEFAULT_CONFIG: Config = Object.freeze({
  default_language: 'english200',
  default_lexer: 'extended-grapheme-clusters',
  max_misalignment: 8,
  theme: Object.freeze({}),
})
