/** An embedded expression. It stops at the first closing brace and may run over several lines. */
export const EXPR_RE = /\$\{([\s\S]*?)\}/g

const NEWLINE_RE = /\r?\n/

export interface SourceLine {
  readonly text: string
  /** 1-based line number in the template */
  readonly line: number
  /** stands in for a newline that was folded into an expression on a previous line */
  readonly placeholder: boolean
}

/**
 * Split the template into lines, folding every multi-line expression into the line
 * it starts on. That line ends right after the expression, and each newline removed
 * is paid back with a placeholder line, so there are exactly as many lines out as in.
 * Text that followed the closing brace stays on its own physical line.
 */
export function preprocess(text: string): SourceLine[] {
  const res: SourceLine[] = []
  let current = ''
  let line = 1
  // the line resumes after a folded expression, it is a placeholder unless it holds text
  let resumed = false

  const end_line = () => {
    const placeholder = resumed && current.trim() === ''
    res.push({ text: placeholder ? '' : current, line, placeholder })
    line++
    current = ''
    resumed = false
  }

  const add_text = (txt: string) => {
    const parts = txt.split(NEWLINE_RE)
    for (let i = 0, l = parts.length - 1; i < l; i++) {
      current += parts[i]
      end_line()
    }
    current += parts[parts.length - 1]
  }

  const re = new RegExp(EXPR_RE.source, 'g')
  let last = 0
  let match: RegExpExecArray | null
  while ((match = re.exec(text))) {
    add_text(text.slice(last, match.index))
    const inner = match[1]
    const newlines = inner.split(NEWLINE_RE).length - 1
    current += '${' + inner.replace(/\r?\n/g, ' ') + '}'
    if (newlines > 0) {
      end_line()
      for (let i = 1; i < newlines; i++) {
        res.push({ text: '', line: line++, placeholder: true })
      }
      resumed = true
    }
    last = re.lastIndex
  }
  add_text(text.slice(last))
  end_line()

  return res
}
