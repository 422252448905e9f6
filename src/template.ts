import fs from 'fs'
import path from 'path'
import sh from 'shelljs'
import c from 'colors'

import { preprocess } from './source'
import { parse, ParseError } from './parser'
import { generate } from './emitter'
import { execute } from './execute'
import { from_parse_error, resolve, Diagnostic } from './diagnostics'
import { FileSink, OutputSink, StreamSink } from './format'
import type { LineMap } from './line-map'
import type { Sequence } from './nodes'
import { init_timer } from './helpers'
import { info, log } from './report'

export interface CompiledTemplate {
  code: string
  line_map: LineMap
  root: Sequence
}

/** Translate a template to javascript. Throws a ParseError when its blocks do not add up. */
export function compile(text: string): CompiledTemplate {
  const { root, line_map } = parse(preprocess(text))
  return { code: generate(root), line_map, root }
}

export interface RunOptions {
  /** file to write the output to, stdout when missing */
  output?: string
  /** file to write the generated javascript to */
  dump?: string
  /** takes precedence over `output` */
  sink?: OutputSink
  /** bound as globals of the template */
  vars?: Record<string, unknown>
  /** exposed to the template as `argv`, defaults to the input name alone */
  argv?: string[]
  debug?: boolean
}

export type RunResult =
  | { ok: true, code: string }
  | { ok: false, diagnostic: Diagnostic, code?: string }

/**
 * Compile and run a template. Template problems come back as a diagnostic, only
 * i/o errors on the given paths are thrown.
 */
export function parse_and_run(text: string, input_name: string, opts: RunOptions = {}): RunResult {
  const timer = init_timer()

  let compiled: CompiledTemplate
  try {
    compiled = compile(text)
  } catch (e) {
    if (e instanceof ParseError) return { ok: false, diagnostic: from_parse_error(e, input_name) }
    throw e
  }
  const code = compiled.code

  if (opts.debug) {
    info(`compiled ${c.grey(input_name)} in ${timer()}`)
    console.error(code)
  }

  let unit = `${input_name}.js`
  if (opts.dump) {
    const made = sh.mkdir('-p', path.dirname(opts.dump))
    if (made.code !== 0) throw new Error(`could not create the directory of ${opts.dump}: ${made.stderr.trim()}`)
    fs.writeFileSync(opts.dump, code + '\n', 'utf-8')
    unit = path.resolve(opts.dump)
  }
  if (opts.debug) log(`running ${c.grey(unit)}`)

  const sink = opts.sink ?? (opts.output ? new FileSink(opts.output) : new StreamSink(process.stdout))
  const res = execute(code, {
    filename: unit,
    sink,
    globals: { ...opts.vars, argv: opts.argv ?? [input_name] },
  })

  if (opts.debug) info(`ran ${c.grey(input_name)} in ${timer()}`)

  if (!res.ok) return { ok: false, diagnostic: resolve(res.failure, compiled.line_map, text, input_name), code }
  return { ok: true, code }
}
