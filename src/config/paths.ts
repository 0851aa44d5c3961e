/**
 * Tapline — Platform-Aware Paths
 *
 * Per-user configuration directory for the current platform:
 *   - Linux/BSD: $XDG_CONFIG_HOME or ~/.config
 *   - macOS:     ~/Library/Application Support
 *   - Windows:   %APPDATA%
 *
 * Usage:
 *   configDir()               → base dir
 *   defaultConfigFilePath()   → <base dir>/config.toml
 */

import { isAbsolute, join } from 'node:path'
import { homedir } from 'node:os'
import { ConfigDirError } from './errors.js'

export const CONFIG_FILE_NAME = 'config.toml'

export type PlatformInfo = {
  platform: NodeJS.Platform
  env: NodeJS.ProcessEnv
  home: string
}

function currentPlatform(): PlatformInfo {
  let home = ''
  try {
    home = homedir()
  } catch (err) {
    throw new ConfigDirError(`could not determine the home directory: ${err instanceof Error ? err.message : String(err)}`)
  }
  return { platform: process.platform, env: process.env, home }
}

export function configDir(info: PlatformInfo = currentPlatform()): string {
  const { platform, env, home } = info

  if (platform === 'win32') {
    if (env.APPDATA) return env.APPDATA
    throw new ConfigDirError('%APPDATA% is not set')
  }

  if (!home) throw new ConfigDirError()

  if (platform === 'darwin') {
    return join(home, 'Library', 'Application Support')
  }

  // XDG says relative paths are invalid and must be ignored
  const xdg = env.XDG_CONFIG_HOME
  return xdg && isAbsolute(xdg) ? xdg : join(home, '.config')
}

export function defaultConfigFilePath(info?: PlatformInfo): string {
  return join(configDir(info), CONFIG_FILE_NAME)
}
