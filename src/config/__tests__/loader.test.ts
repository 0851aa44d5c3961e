import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfig, parseConfig } from '../loader.js'
import { DEFAULT_CONFIG } from '../defaults.js'
import { ConfigError, StyleParseError } from '../errors.js'

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'tapline-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function writeConfig(contents: string | Buffer): string {
  const path = join(dir, 'config.toml')
  writeFileSync(path, contents)
  return path
}

function loadError(text: string): ConfigError {
  try {
    parseConfig(text)
  } catch (err) {
    if (err instanceof ConfigError) return err
    throw err
  }
  throw new Error('expected parseConfig to throw')
}

describe('loadConfig - missing or unreadable file', () => {
  it('returns the defaults when the file does not exist', () => {
    const config = loadConfig(join(dir, 'nope.toml'))
    expect(config).toBe(DEFAULT_CONFIG)
    expect(config.default_language).toBe('english200')
    expect(config.default_lexer).toBe('extended-grapheme-clusters')
    expect(config.max_misalignment).toBe(8)
    expect(config.theme).toEqual({})
  })

  it('returns the defaults when the path is a directory', () => {
    expect(loadConfig(dir)).toBe(DEFAULT_CONFIG)
  })

  it('returns the defaults when the file is not valid UTF-8', () => {
    const path = writeConfig(Buffer.from([0x6d, 0x61, 0x78, 0xff, 0xfe]))
    expect(loadConfig(path)).toBe(DEFAULT_CONFIG)
  })
})

describe('loadConfig - present file', () => {
  it('falls back to defaults field by field', () => {
    const config = loadConfig(writeConfig('max_misalignment = 3\n'))
    expect(config).toEqual({ ...DEFAULT_CONFIG, max_misalignment: 3 })
  })

  it('reads every field', () => {
    const config = loadConfig(writeConfig([
      'default_language = "/usr/share/tapline/german1000"',
      'default_lexer = "unicode-words"',
      'max_misalignment = 0',
      '',
      '[theme]',
      'cursor = "black:white;bold"',
    ].join('\n')))
    expect(config.default_language).toBe('/usr/share/tapline/german1000')
    expect(config.default_lexer).toBe('unicode-words')
    expect(config.max_misalignment).toBe(0)
    expect(config.theme).toEqual({
      cursor: { fg: 'black', bg: 'white', modifiers: new Set(['bold']) },
    })
  })

  it('treats an empty file as all defaults', () => {
    expect(loadConfig(writeConfig(''))).toEqual(DEFAULT_CONFIG)
  })

  it('ignores unknown keys', () => {
    const config = parseConfig('colour_mode = "auto"\n[extras]\nanswer = 42\n')
    expect(config).toEqual(DEFAULT_CONFIG)
    expect(Object.keys(config)).toEqual(['default_language', 'default_lexer', 'max_misalignment', 'theme'])
  })

  it('returns a frozen config', () => {
    const config = parseConfig('[theme]\ntitle = "none;bold"\n')
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.theme)).toBe(true)
    expect(Object.isFrozen(config.theme.title)).toBe(true)
  })

  it('throws on invalid TOML instead of falling back', () => {
    const path = writeConfig('max_misalignment = = 3\n')
    expect(() => loadConfig(path)).toThrow(ConfigError)
  })
})

describe('parseConfig - errors', () => {
  it('reports syntax errors with their position', () => {
    const err = loadError('default_lexer = "unterminated\n')
    expect(err.kind).toBe('syntax')
    expect(err.message).toMatch(/^invalid TOML at line \d+, column \d+: /)
  })

  it('reports a wrong-typed field with its path', () => {
    const err = loadError('max_misalignment = "three"\n')
    expect(err.kind).toBe('schema')
    expect(err.path).toBe('max_misalignment')
    expect(err.message.startsWith('max_misalignment: ')).toBe(true)
  })

  it('rejects negative and fractional misalignment', () => {
    expect(loadError('max_misalignment = -1\n').path).toBe('max_misalignment')
    expect(loadError('max_misalignment = 1.5\n').path).toBe('max_misalignment')
  })

  it('rejects floats for misalignment even when they are whole', () => {
    for (const text of ['max_misalignment = 3.0\n', 'max_misalignment = 1e2\n']) {
      const err = loadError(text)
      expect(err.kind).toBe('schema')
      expect(err.path).toBe('max_misalignment')
    }
  })

  it('reports an integer too large to hold as a schema error', () => {
    const err = loadError('max_misalignment = 9007199254740993\n')
    expect(err.kind).toBe('schema')
    expect(err.path).toBe('max_misalignment')
    expect(err.message).toBe('max_misalignment: Number must be at most 9007199254740991')
  })

  it('accepts the largest safe integer as a number', () => {
    expect(parseConfig('max_misalignment = 9007199254740991\n').max_misalignment).toBe(Number.MAX_SAFE_INTEGER)
  })

  it('rejects a theme that is not a table', () => {
    expect(loadError('theme = "dark"\n').path).toBe('theme')
  })

  it('surfaces style errors from the theme', () => {
    const err = loadError('[theme]\ntitle = "red;blinky"\n')
    expect(err.kind).toBe('schema')
    expect(err.path).toBe('theme.title')
    expect(err.message).toBe('theme.title: invalid value "blinky", expected a style modifier')
    expect(err.cause).toBeInstanceOf(StyleParseError)
  })

  it('surfaces color errors from the theme', () => {
    const err = loadError('[theme]\ntitle = "notacolor"\n')
    expect(err.path).toBe('theme.title')
    expect(err.cause).toBeInstanceOf(StyleParseError)
    if (err.cause instanceof StyleParseError) {
      expect(err.cause.kind).toBe('unrecognized-color')
      expect(err.cause.value).toBe('notacolor')
    }
  })
})
