import { EXPR_RE } from './source'

/**
 * Names used by generated code. Greek letters keep them out of the way of whatever
 * the template declares.
 *   'Σ' writes one line of output, it is the only thing the host provides
 *   'εout' is the accumulator of a pypdef block
 */
export const OUTPUT_FN = 'Σ'
export const ACCUMULATOR = 'εout'

export type EmitTarget = 'output' | 'accumulator'

/** U+2028 and U+2029 end a line for V8 and acorn, a raw one would shift the line map */
function escape_separators(txt: string): string {
  return txt.replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029')
}

/** Escape text so that it can sit between backticks */
export function escape_literal(txt: string): string {
  return escape_separators(txt.replace(/(`|\$|\\)/g, '\\$1').replace(/\r/g, '\\r'))
}

/**
 * Turn a literal template line into a single emission statement.
 * Each `${...}` becomes a slot of a template string, its expression is kept as written.
 */
export function literal_statement(line: string, target: EmitTarget): string {
  const call = target === 'accumulator' ? `${ACCUMULATOR}.push` : OUTPUT_FN
  const re = new RegExp(EXPR_RE.source, 'g')

  let res = ''
  let last = 0
  let found = false
  let match: RegExpExecArray | null
  while ((match = re.exec(line))) {
    found = true
    res += escape_literal(line.slice(last, match.index)) + '${(' + match[1] + ')}'
    last = re.lastIndex
  }

  if (!found) return `${call}(${escape_separators(JSON.stringify(line))})`

  res += escape_literal(line.slice(last))
  return `${call}(\`${res}\`)`
}
