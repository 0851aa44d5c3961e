#!/usr/bin/env node

/**
 * Tapline — Entry Point
 *
 * Resolves the config path → loads config → prints it or previews styles.
 *
 *   tapline [--config <path>] [--print-config] [--style <style>...]
 */

import { flagValue, flagValues } from './args.js'
import { loadConfig } from './config/loader.js'
import { defaultConfigFilePath } from './config/paths.js'
import { parseStyle } from './config/style.js'
import type { Config, Style } from './config/types.js'
import { renderStyled } from './ui/render.js'
import { resolveStyle } from './ui/theme.js'
import type { BuiltinStyleName } from './ui/theme.js'

function fail(message: string): never {
    console.error(message)
    process.exit(1)
}

/** JSON view of a config: Sets become arrays */
function toJson(config: Config): string {
    return JSON.stringify(config, (_key, value: unknown) => (value instanceof Set ? [...value] : value), 2)
}

const argv = process.argv.slice(2)

// ── Parse args, load config ──────────────────────────────────────────
let configPath: string
let config: Config
let styles: string[]
try {
    styles = flagValues(argv, '--style')
    configPath = flagValue(argv, '--config') ?? defaultConfigFilePath()
    config = loadConfig(configPath)
} catch (err) {
    fail(`tapline: ${err instanceof Error ? err.message : String(err)}`)
}

const paint = (name: BuiltinStyleName, text: string) =>
    renderStyled(text, resolveStyle(config.theme, name))

// ── Print config ─────────────────────────────────────────
if (argv.includes('--print-config')) {
    console.log(paint('muted', `# ${configPath}`))
    console.log(toJson(config))
}

// ── Preview styles ───────────────────────────────────────
if (styles.length > 0) {
    console.log(paint('heading', 'Styles'))
    let failed = false
    for (const token of styles) {
        const result = parseStyle(token.trim())
        if (!result.ok) {
            console.error(`  ${paint('label', token)}  ${paint('error', result.error.message)}`)
            failed = true
            continue
        }
        const style: Style = result.value
        console.log(`  ${paint('label', token)}  ${renderStyled('The quick brown fox', style)}`)
    }
    if (failed) process.exit(1)
}

if (!argv.includes('--print-config') && styles.length === 0) {
    console.log(`${paint('heading', 'tapline')} ${paint('muted', `— config from ${configPath}`)}`)
    console.log(`  ${paint('label', 'language')}          ${config.default_language}`)
    console.log(`  ${paint('label', 'lexer')}             ${config.default_lexer}`)
    console.log(`  ${paint('label', 'max misalignment')}  ${config.max_misalignment}`)
    console.log(`  ${paint('label', 'theme entries')}     ${Object.keys(config.theme).length}`)
}
