/**
 * Tapline — Config Schema
 *
 * Validates a parsed TOML tree field by field. Missing fields take their
 * value from DEFAULT_CONFIG, present ones must have the right type.
 * Unknown keys are dropped.
 */

import { z } from 'zod'
import { DEFAULT_CONFIG } from './defaults.js'
import { ConfigError, StyleParseError } from './errors.js'
import { parseStyle } from './style.js'
import type { Config } from './types.js'

export const StyleSchema = z.string().transform((value, ctx) => {
  const result = parseStyle(value)
  if (!result.ok) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: result.error.message,
      params: { styleError: result.error },
    })
    return z.NEVER
  }
  return result.value
})

export const ConfigSchema = z.object({
  default_language: z.string().default(DEFAULT_CONFIG.default_language),
  default_lexer: z.string().default(DEFAULT_CONFIG.default_lexer),
  // integers arrive as bigint, so a TOML float here is a type error
  max_misalignment: z
    .bigint()
    .nonnegative()
    .lte(BigInt(Number.MAX_SAFE_INTEGER), { message: 'Number must be at most 9007199254740991' })
    .transform(Number)
    .default(BigInt(DEFAULT_CONFIG.max_misalignment)),
  theme: z.record(z.string(), StyleSchema).default({}),
})

function formatPath(path: (string | number)[]): string {
  return path.length ? path.join('.') : '<root>'
}

function styleErrorOf(issue: z.ZodIssue): StyleParseError | undefined {
  if (issue.code !== z.ZodIssueCode.custom) return undefined
  const candidate: unknown = issue.params?.styleError
  return candidate instanceof StyleParseError ? candidate : undefined
}

/** Resolve a parsed TOML tree into a Config. Throws ConfigError on any invalid field. */
export function resolveConfig(tree: unknown): Config {
  const result = ConfigSchema.safeParse(tree)
  if (!result.success) {
    const [first, ...rest] = result.error.issues
    const message = [first, ...rest]
      .map((issue, i) => (i === 0 ? issue.message : `${formatPath(issue.path)}: ${issue.message}`))
      .join('; ')
    throw new ConfigError('schema', message, {
      path: formatPath(first.path),
      cause: styleErrorOf(first) ?? result.error,
    })
  }

  const { theme, ...fields } = result.data
  return Object.freeze({ ...fields, theme: Object.freeze(theme) })
}
