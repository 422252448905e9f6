import type { Keyword, StartKeyword } from './keywords'

/** One generated statement. `verbatim` lines are written as is, without indentation. */
export interface StatementLine {
  kind: 'statement'
  text: string
  verbatim: boolean
}

/** One clause of a control block, `if` or `elif` or `else` for instance. */
export interface ControlBlock {
  keyword: Keyword
  header: string
  /** template line of the directive */
  line: number
  nodes: Node[]
}

export interface ControlSequence {
  kind: 'control'
  keyword: StartKeyword
  line: number
  /** the start clause comes first, then the middle clauses in the order they were opened */
  blocks: ControlBlock[]
}

export type Node = StatementLine | ControlSequence

export interface Sequence {
  kind: 'sequence'
  nodes: Node[]
}

export function statement(text: string, verbatim = false): StatementLine {
  return { kind: 'statement', text, verbatim }
}
