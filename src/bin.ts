#!/usr/bin/env node
import fs from 'fs'
import yml from 'js-yaml'

import { parse_and_run, RunResult } from './template'
import { format_diagnostic } from './diagnostics'
import { CONFIG_NAME, ConfigError, default_config, find_config, load_config } from './config'
import { error } from './report'

export const VERSION = '1.0.0'

export interface CliOptions {
  template: string
  /** arguments after the template name, handed to the template */
  args: string[]
  output?: string
  dump?: string
  debug: boolean
  vars: Record<string, unknown>
}

export type CliRequest = { kind: 'run', options: CliOptions } | { kind: 'help' } | { kind: 'version' }

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export function usage(): string {
  return [
    'weft [options] <template> [template arguments...]',
    '',
    'Options:',
    '  -o, --output <file>      Write the output to <file> instead of stdout',
    '  -j, --js <file>          Also write the generated javascript to <file>',
    '  -d, --debug              Show the generated javascript, timings and the template traceback',
    '  -D, --define <name=val>  Bind a template variable, the value is read as yaml (repeatable)',
    '  -v, --version            Print version',
    '  -h, --help               Show help',
    '',
    `Variables and debug may also be set in a ${CONFIG_NAME} found in the current directory or above.`,
    '',
  ].join('\n')
}

function define(opt: string, vars: Record<string, unknown>) {
  const eq = opt.indexOf('=')
  if (eq <= 0) throw new UsageError(`--define expects name=value, got '${opt}'`)
  const name = opt.slice(0, eq)
  const raw = opt.slice(eq + 1)
  try {
    vars[name] = raw === '' ? '' : yml.load(raw)
  } catch {
    vars[name] = raw
  }
}

/** Everything after the template name belongs to the template */
export function parse_args(argv: string[]): CliRequest {
  let output: string | undefined
  let dump: string | undefined
  let debug = false
  const vars: Record<string, unknown> = {}

  const value = (i: number, opt: string): string => {
    const v = argv[i]
    if (v === undefined || v === '') throw new UsageError(`${opt} expects a value`)
    return v
  }

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    switch (a) {
      case '-h':
      case '--help':
        return { kind: 'help' }
      case '-v':
      case '--version':
        return { kind: 'version' }
      case '-o':
      case '--output':
        output = value(++i, a)
        continue
      case '-j':
      case '--js':
        dump = value(++i, a)
        continue
      case '-d':
      case '--debug':
        debug = true
        continue
      case '-D':
      case '--define':
        define(value(++i, a), vars)
        continue
      case '--': {
        const template = value(++i, 'weft')
        return { kind: 'run', options: { template, args: argv.slice(i + 1), output, dump, debug, vars } }
      }
    }
    if (a.startsWith('-') && a !== '-') throw new UsageError(`unknown option '${a}'`)
    return { kind: 'run', options: { template: a, args: argv.slice(i + 1), output, dump, debug, vars } }
  }

  throw new UsageError(`no template given`)
}

export function main(argv: string[]): number {
  let req: CliRequest
  try {
    req = parse_args(argv)
  } catch (e) {
    if (!(e instanceof UsageError)) throw e
    error(e.message)
    process.stderr.write(usage())
    return 1
  }

  if (req.kind === 'help') {
    process.stdout.write(usage())
    return 0
  }
  if (req.kind === 'version') {
    process.stdout.write(`${VERSION}\n`)
    return 0
  }

  const opts = req.options
  let config = default_config()
  try {
    const found = find_config(process.cwd())
    if (found) config = load_config(found)
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e
    error(e.message)
    return 1
  }

  let text: string
  try {
    text = fs.readFileSync(opts.template === '-' ? 0 : opts.template, 'utf-8')
  } catch (e) {
    error(`could not read ${opts.template}: ${e instanceof Error ? e.message : String(e)}`)
    return 1
  }

  const debug = opts.debug || config.debug
  let res: RunResult
  try {
    res = parse_and_run(text, opts.template, {
      output: opts.output,
      dump: opts.dump,
      debug,
      vars: { ...config.vars, ...opts.vars },
      argv: [opts.template, ...opts.args],
    })
  } catch (e) {
    error(e instanceof Error ? e.message : String(e))
    return 1
  }

  if (!res.ok) {
    console.error(format_diagnostic(res.diagnostic, debug))
    return 1
  }
  return 0
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2))
}
