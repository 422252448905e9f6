import vm from 'vm'
import { parse as acorn_parse } from 'acorn'

import { OUTPUT_FN } from './literal'
import type { OutputSink } from './format'

/** The generated javascript does not parse. */
export interface SyntaxFailure {
  kind: 'syntax'
  generated_line: number | null
  name: string
  message: string
}

/** The generated javascript threw while running. */
export interface RuntimeFailure {
  kind: 'runtime'
  /** innermost frame of the generated unit */
  generated_line: number | null
  /** every frame of the generated unit, innermost first */
  frames: number[]
  name: string
  message: string
}

export type ExecutionFailure = SyntaxFailure | RuntimeFailure

export type ExecutionResult = { ok: true } | { ok: false, failure: ExecutionFailure }

export interface ExecuteOptions {
  /** name of the generated unit, as it shows in stack traces */
  filename: string
  sink: OutputSink
  /** bound as globals of the context, next to the output function */
  globals?: Record<string, unknown>
}

function escape_re(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Check that the code parses, the way acorn reports it */
export function check_structure(code: string): SyntaxFailure | null {
  try {
    acorn_parse(code, { ecmaVersion: 'latest', sourceType: 'script', locations: true })
    return null
  } catch (e) {
    const { name, message } = describe(e)
    return {
      kind: 'syntax',
      generated_line: acorn_line(e),
      name,
      // acorn appends the (line:column) of the generated code
      message: message.replace(/ \(\d+:\d+\)$/, ''),
    }
  }
}

function acorn_line(e: unknown): number | null {
  if (typeof e !== 'object' || e === null || !('loc' in e)) return null
  const loc = e.loc
  if (typeof loc !== 'object' || loc === null || !('line' in loc)) return null
  return typeof loc.line === 'number' ? loc.line : null
}

/**
 * The generated lines of the frames that belong to the unit in a V8 stack trace,
 * innermost first.
 */
export function unit_frames(stack: string, filename: string): number[] {
  const re = new RegExp(`^\\s+at (?:.*\\()?${escape_re(filename)}:(\\d+):\\d+\\)?$`)
  const res: number[] = []
  for (const line of stack.split('\n')) {
    const m = re.exec(line)
    if (m) res.push(Number(m[1]))
  }
  return res
}

/** V8 starts the stack of a compilation error with `<filename>:<line>` */
function compile_error_line(stack: string, filename: string): number | null {
  const m = new RegExp(`^${escape_re(filename)}:(\\d+)`).exec(stack)
  return m ? Number(m[1]) : null
}

/**
 * Errors thrown inside the context come from another realm, `instanceof Error`
 * does not hold for them.
 */
function describe(e: unknown): { name: string, message: string, stack: string } {
  if (typeof e === 'object' && e !== null && 'message' in e) {
    return {
      name: 'name' in e && typeof e.name === 'string' ? e.name : 'Error',
      message: String(e.message),
      stack: 'stack' in e && typeof e.stack === 'string' ? e.stack : '',
    }
  }
  return { name: 'Error', message: String(e), stack: '' }
}

function run(code: string, opts: ExecuteOptions): ExecutionResult {
  const structural = check_structure(code)
  if (structural) return { ok: false, failure: structural }

  let script: vm.Script
  try {
    script = new vm.Script(code, { filename: opts.filename })
  } catch (e) {
    const { name, message, stack } = describe(e)
    return { ok: false, failure: { kind: 'syntax', generated_line: compile_error_line(stack, opts.filename), name, message } }
  }

  const sink = opts.sink
  const context = vm.createContext({
    ...opts.globals,
    [OUTPUT_FN]: (line: unknown) => sink.write(String(line)),
  })

  try {
    script.runInContext(context)
  } catch (e) {
    const { name, message, stack } = describe(e)
    const frames = unit_frames(stack, opts.filename)
    return {
      ok: false,
      failure: { kind: 'runtime', generated_line: frames.length ? frames[0] : null, frames, name, message },
    }
  }

  return { ok: true }
}

/**
 * Run generated code in a fresh context. The sink is closed whatever happens,
 * with the outcome of the run.
 */
export function execute(code: string, opts: ExecuteOptions): ExecutionResult {
  let ok = false
  try {
    const res = run(code, opts)
    ok = res.ok
    return res
  } finally {
    opts.sink.close(ok)
  }
}
