/**
 * Tapline — Config Loader
 *
 * Loads config.toml, resolving each field against the defaults.
 * A missing or unreadable file means defaults; a file that is
 * present but broken is a ConfigError.
 */

import { readFileSync } from 'node:fs'
import { parse as parseToml, TomlError } from 'smol-toml'
import { DEFAULT_CONFIG } from './defaults.js'
import { ConfigError } from './errors.js'
import { resolveConfig } from './schema.js'
import type { Config } from './types.js'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/** Read a file as strict UTF-8. Returns undefined if it cannot be read. */
function readConfigText(path: string): string | undefined {
  try {
    return utf8.decode(readFileSync(path))
  } catch {
    return undefined
  }
}

/** Parse config.toml text into a Config */
export function parseConfig(text: string): Config {
  let tree: Record<string, unknown>
  try {
    tree = parseToml(text, { integersAsBigInt: true })
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ConfigError('syntax', `invalid TOML at line ${err.line}, column ${err.column}: ${err.message}`, { cause: err })
    }
    throw err
  }
  return resolveConfig(tree)
}

/** Load config from `path`, falling back to defaults if the file can't be read */
export function loadConfig(path: string): Config {
  const raw = readConfigText(path)
  if (raw === undefined) {
    return DEFAULT_CONFIG
  }
  return parseConfig(raw)
}
