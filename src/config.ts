import fs from 'fs'
import path from 'path'
import yml from 'js-yaml'

import { warn } from './report'

export const CONFIG_NAME = 'weft.yml'

/**
 * weft.yml
 *
 *   debug: true
 *   vars:
 *     title: Release notes
 *     versions: [1, 2, 3]
 */
export interface WeftConfig {
  /** where it was read from, null when there was no file */
  path: string | null
  debug: boolean
  vars: Record<string, unknown>
}

export class ConfigError extends Error {
  constructor(public file: string, message: string) {
    super(`${file}: ${message}`)
    this.name = 'ConfigError'
  }
}

export function default_config(): WeftConfig {
  return { path: null, debug: false, vars: {} }
}

/** Look for weft.yml in `dir` and then in its parents */
export function find_config(dir: string): string | null {
  let current = path.resolve(dir)
  while (true) {
    const fname = path.join(current, CONFIG_NAME)
    if (fs.existsSync(fname)) return fname
    const parent = path.dirname(current)
    if (parent === current) return null
    current = parent
  }
}

function is_mapping(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function parse_config(contents: string, file: string): WeftConfig {
  let data: unknown
  try {
    data = yml.load(contents, { filename: file })
  } catch (e) {
    throw new ConfigError(file, e instanceof Error ? e.message : String(e))
  }

  const res = default_config()
  res.path = file
  if (data === undefined || data === null) return res
  if (!is_mapping(data)) throw new ConfigError(file, `expected a mapping at the top level`)

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'debug': {
        if (typeof value !== 'boolean') throw new ConfigError(file, `'debug' should be true or false`)
        res.debug = value
        break
      }
      case 'vars': {
        if (value === null) break
        if (!is_mapping(value)) throw new ConfigError(file, `'vars' should be a mapping of names to values`)
        res.vars = { ...value }
        break
      }
      default:
        warn(`${file}: unknown key '${key}' ignored`)
    }
  }

  return res
}

export function load_config(file: string): WeftConfig {
  return parse_config(fs.readFileSync(file, 'utf-8'), file)
}
