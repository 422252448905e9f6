/**
This is the block parser of the weft template language.

Lines are read once, top to bottom. Every control directive opens a nested call of
`parse_body` that runs until its `%end...` directive, so the recursion depth is the
nesting depth of the template. What each line turns into is decided in this order :
  '##'             a comment, nothing is generated
  '<%' ... '%>'    a block of raw javascript, re-indented
  '%kw ...:'       a start keyword, opens a block
  '%elif ...:'     a middle keyword, opens another clause of the current block
  '%endkw'         closes the current block
  '% ...'          a single raw javascript statement
  anything else    literal text, written to the output
*/

import type { SourceLine } from './source'
import { LineMap } from './line-map'
import { ACCUMULATOR, literal_statement } from './literal'
import { ControlBlock, ControlSequence, Node, Sequence, statement } from './nodes'
import {
  START_KEYWORDS, MIDDLE_KEYWORDS, StartKeyword, MiddleKeyword, Keyword,
  as_start_keyword, as_middle_keyword, start_of, head_rule, header_line,
} from './keywords'

const COMMENT_RE = /^\s*##/
const VERBATIM_START_RE = /^\s*<%/
const VERBATIM_END_RE = /^\s*%>/
const START_RE = new RegExp(`^\\s*%\\s*(${START_KEYWORDS.join('|')})\\b(.*):\\s*$`)
const MIDDLE_RE = new RegExp(`^\\s*%\\s*(${MIDDLE_KEYWORDS.join('|')})\\b(.*):\\s*$`)
const END_RE = new RegExp(`^\\s*%\\s*end(${START_KEYWORDS.join('|')})\\s*$`)
const STATEMENT_RE = /^\s*%\s*(.*)$/

/** blank lines and javascript line comments do not count when measuring the indentation of a '<%' block */
const BLANK_OR_COMMENT_RE = /^\s*(\/\/|$)/
const UNESCAPED_BACKTICK_RE = /(?<!\\)`/g

export class ParseError extends Error {
  constructor(message: string, public text: string, public line: number) {
    super(message)
    this.name = 'ParseError'
  }
}

export interface ParsedTemplate {
  root: Sequence
  line_map: LineMap
}

/**
 * A read position into the template lines. There is only one, handed down to
 * nested blocks and handed back when they return.
 */
export class Cursor {
  pos = 0
  constructor(public readonly lines: readonly SourceLine[]) { }

  next(): SourceLine | undefined {
    if (this.pos >= this.lines.length) return undefined
    return this.lines[this.pos++]
  }

  /** the line reported when the template ends too early */
  get last(): SourceLine {
    return this.lines[this.lines.length - 1] ?? { text: '', line: 1, placeholder: false }
  }
}

/**
 * Where new nodes go. The root has no control sequence, an open block
 * redirects its nodes to the clause that was opened last.
 */
class BlockBuilder {
  constructor(
    public nodes: Node[],
    public control: ControlSequence | null,
    public accumulate: boolean,
  ) { }

  open_clause(keyword: Keyword, header: string, line: number) {
    if (!this.control) throw new Error(`unexpected error, no block to add a clause to`)
    const block: ControlBlock = { keyword, header, line, nodes: [] }
    this.control.blocks.push(block)
    this.nodes = block.nodes
  }
}

export class Parser {
  line_map = new LineMap()

  constructor(public lines: readonly SourceLine[]) { }

  parse(): ParsedTemplate {
    const root: Sequence = { kind: 'sequence', nodes: [] }
    this.parse_body(new Cursor(this.lines), new BlockBuilder(root.nodes, null, false))
    return { root, line_map: this.line_map }
  }

  /**
   * Consume lines until the end keyword of the block being built, or the end of
   * the template for the root.
   */
  parse_body(cursor: Cursor, b: BlockBuilder): void {
    let src: SourceLine | undefined
    while ((src = cursor.next())) {
      const text = src.text
      if (src.placeholder || COMMENT_RE.test(text)) continue

      if (VERBATIM_START_RE.test(text)) {
        this.verbatim_block(cursor, b, src)
        continue
      }

      let m = START_RE.exec(text)
      if (m) {
        const keyword = as_start_keyword(m[1])
        if (keyword) {
          b.nodes.push(this.control_block(cursor, b, src, keyword, m[2].trim()))
          continue
        }
      }

      m = MIDDLE_RE.exec(text)
      if (m) {
        const keyword = as_middle_keyword(m[1])
        if (keyword) {
          this.middle_clause(b, src, keyword, m[2].trim())
          continue
        }
      }

      m = END_RE.exec(text)
      if (m) {
        const keyword = as_start_keyword(m[1])
        if (keyword) {
          this.end_block(b, src, keyword)
          return
        }
      }

      m = STATEMENT_RE.exec(text)
      if (m) {
        this.add(b, m[1].trimEnd(), src.line)
        continue
      }

      this.add(b, literal_statement(text, b.accumulate ? 'accumulator' : 'output'), src.line)
    }

    if (b.control) {
      const last = cursor.last
      throw new ParseError(`reached the end of the template with '%${b.control.keyword}' from line ${b.control.line} still open, expected '%end${b.control.keyword}'`, last.text, last.line)
    }
  }

  add(b: BlockBuilder, text: string, line: number | null) {
    b.nodes.push(statement(text))
    if (line === null) this.line_map.synthetic()
    else this.line_map.map(line)
  }

  check_head(keyword: Keyword, head: string, src: SourceLine) {
    const rule = head_rule(keyword)
    if (rule === 'required' && !head)
      throw new ParseError(`'%${keyword}' expects something before ':'`, src.text, src.line)
    if (rule === 'forbidden' && head)
      throw new ParseError(`'%${keyword}' takes nothing before ':'`, src.text, src.line)
  }

  control_block(cursor: Cursor, b: BlockBuilder, src: SourceLine, keyword: StartKeyword, head: string): ControlSequence {
    this.check_head(keyword, head, src)
    const control: ControlSequence = { kind: 'control', keyword, line: src.line, blocks: [] }
    const inner = new BlockBuilder([], control, b.accumulate || keyword === 'pypdef')
    inner.open_clause(keyword, header_line(keyword, head, b.control?.keyword ?? null), src.line)
    this.line_map.map(src.line)

    if (keyword === 'pypdef') {
      this.add(inner, `const ${ACCUMULATOR} = []`, null)
    }

    this.parse_body(cursor, inner)
    return control
  }

  middle_clause(b: BlockBuilder, src: SourceLine, keyword: MiddleKeyword, head: string) {
    const expected = start_of(keyword)
    if (!b.control)
      throw new ParseError(`found '%${keyword}' without an open '%${expected}'`, src.text, src.line)
    if (b.control.keyword !== expected)
      throw new ParseError(`'%${keyword}' does not match the open '%${b.control.keyword}' from line ${b.control.line}`, src.text, src.line)
    this.check_head(keyword, head, src)

    b.open_clause(keyword, header_line(keyword, head, null), src.line)
    this.line_map.map(src.line)
  }

  end_block(b: BlockBuilder, src: SourceLine, keyword: StartKeyword) {
    if (!b.control)
      throw new ParseError(`found '%end${keyword}' without an open '%${keyword}'`, src.text, src.line)
    if (b.control.keyword !== keyword)
      throw new ParseError(`'%end${keyword}' does not match the open '%${b.control.keyword}' from line ${b.control.line}`, src.text, src.line)

    if (keyword === 'pypdef') {
      this.add(b, `return ${ACCUMULATOR}.join('\\n')`, null)
    }
    // the closing brace
    this.line_map.map(src.line)
  }

  /**
   * Raw javascript between '<%' and '%>'. The indentation of the first line that
   * is not blank or a comment is removed from all lines, except for those that
   * are inside a multi-line template string, which are kept exactly as written.
   */
  verbatim_block(cursor: Cursor, b: BlockBuilder, start: SourceLine) {
    const collected: { src: SourceLine, in_string: boolean }[] = []
    let min_spaces: number | null = null
    let in_string = false

    while (true) {
      const src = cursor.next()
      if (!src)
        throw new ParseError(`'<%' block is never closed by '%>'`, start.text, start.line)
      if (VERBATIM_END_RE.test(src.text)) break
      if (src.placeholder) continue

      collected.push({ src, in_string })
      const ticks = src.text.match(UNESCAPED_BACKTICK_RE)?.length ?? 0
      if (ticks % 2 !== 0) in_string = !in_string

      if (min_spaces === null && !BLANK_OR_COMMENT_RE.test(src.text)) {
        min_spaces = leading_spaces(src.text)
      }
    }

    for (const { src, in_string } of collected) {
      const text = in_string ? src.text : strip_indent(src.text, min_spaces ?? 0)
      b.nodes.push(statement(text, in_string))
      this.line_map.map(src.line)
    }
  }
}

function leading_spaces(line: string): number {
  let i = 0
  while (line[i] === ' ' || line[i] === '\t') { i++ }
  return i
}

/** Remove up to `count` whitespace characters from the start of the line */
function strip_indent(line: string, count: number): string {
  return line.slice(Math.min(count, leading_spaces(line)))
}

export function parse(lines: readonly SourceLine[]): ParsedTemplate {
  return new Parser(lines).parse()
}
