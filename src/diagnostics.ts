import c from 'colors'

import type { LineMap } from './line-map'
import type { ParseError } from './parser'
import type { ExecutionFailure } from './execute'

export type DiagnosticKind = 'parse' | 'syntax' | 'runtime'

export interface TraceEntry {
  generated_line: number
  line: number | null
  source: string | null
}

/**
 * A failure, told in terms of the template. `line` and `source` are null when the
 * failing generated line has no template counterpart.
 */
export interface Diagnostic {
  kind: DiagnosticKind
  file: string
  line: number | null
  source: string | null
  generated_line: number | null
  name: string
  message: string
  /** frames of a runtime failure, innermost first */
  trace: TraceEntry[]
}

const TITLES: { [K in DiagnosticKind]: string } = {
  parse: 'parse error',
  syntax: 'syntax error',
  runtime: 'error',
}

export function from_parse_error(err: ParseError, file: string): Diagnostic {
  return {
    kind: 'parse',
    file,
    line: err.line,
    source: err.text,
    generated_line: null,
    name: err.name,
    message: err.message,
    trace: [],
  }
}

/**
 * Map a failing generated line back to the template. There is no guessing: a line
 * the map does not know about stays unknown.
 */
export function resolve_line(generated_line: number | null, line_map: LineMap, template_lines: readonly string[]): { line: number | null, source: string | null } {
  if (generated_line === null) return { line: null, source: null }
  const line = line_map.lookup(generated_line)
  if (line === undefined) return { line: null, source: null }
  return { line, source: template_lines[line - 1] ?? '' }
}

export function resolve(failure: ExecutionFailure, line_map: LineMap, template: string, file: string): Diagnostic {
  const template_lines = template.split(/\r?\n/)
  const { line, source } = resolve_line(failure.generated_line, line_map, template_lines)
  const trace = failure.kind === 'runtime'
    ? failure.frames.map(g => ({ generated_line: g, ...resolve_line(g, line_map, template_lines) }))
    : []

  return {
    kind: failure.kind,
    file,
    line,
    source,
    generated_line: failure.generated_line,
    name: failure.name,
    message: failure.message,
    trace,
  }
}

/**
 * The text shown to the user. In debug mode, runtime failures also get the
 * template traceback, outermost call last.
 */
export function format_diagnostic(d: Diagnostic, debug = false): string {
  const res: string[] = []
  const title = c.red(c.bold(` ! ${TITLES[d.kind]}`))

  if (d.line !== null) {
    res.push(`${title} ${c.grey(`${d.file}:${d.line}`)}`)
    res.push(`    ${d.source ?? ''}`)
  } else {
    res.push(`${title} ${c.grey(d.file)}`)
    res.push(`    could not find the template source line` + (d.generated_line !== null ? ` (generated line ${d.generated_line})` : ''))
  }
  res.push(`${c.bold(d.name)}: ${d.message}`)

  if (debug && d.trace.length > 0) {
    res.push(c.grey('template traceback:'))
    for (const t of d.trace) {
      res.push(t.line !== null
        ? `  ${c.grey(`${d.file}:${t.line}`)}  ${t.source?.trim() ?? ''}`
        : `  ${c.grey(`(unknown template line, generated line ${t.generated_line})`)}`)
    }
  }

  return res.join('\n')
}
