/**
 * Tapline — Config Errors
 */

export type StyleErrorKind = 'unrecognized-color' | 'invalid-color' | 'invalid-modifier'

/** A color or style string that could not be parsed */
export class StyleParseError extends Error {
  readonly kind: StyleErrorKind
  /** The offending token */
  readonly value: string
  /** What was expected in its place */
  readonly expected: string

  constructor(kind: StyleErrorKind, value: string, expected: string, reason?: string) {
    super(reason ?? `invalid value ${JSON.stringify(value)}, expected ${expected}`)
    this.name = 'StyleParseError'
    this.kind = kind
    this.value = value
    this.expected = expected
  }
}

export type ConfigErrorKind = 'syntax' | 'schema'

/** A config file that exists but cannot be turned into a Config */
export class ConfigError extends Error {
  readonly kind: ConfigErrorKind
  readonly path?: string

  constructor(kind: ConfigErrorKind, message: string, options?: { path?: string; cause?: unknown }) {
    super(options?.path ? `${options.path}: ${message}` : message, { cause: options?.cause })
    this.name = 'ConfigError'
    this.kind = kind
    this.path = options?.path
  }
}

/** The platform has no per-user config directory we can resolve */
export class ConfigDirError extends Error {
  constructor(message = 'could not determine the user configuration directory') {
    super(message)
    this.name = 'ConfigDirError'
  }
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StyleParseError }
