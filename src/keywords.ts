/**
 * The control keyword family.
 *
 * A start keyword opens a block (`%if x:`), a middle keyword opens another clause of
 * the same block (`%else:`) and `%end<start keyword>` closes it.
 */

export type StartKeyword = 'for' | 'if' | 'try' | 'while' | 'def' | 'class' | 'with' | 'pypdef'
export type MiddleKeyword = 'elif' | 'else' | 'except' | 'finally'
export type Keyword = StartKeyword | MiddleKeyword

export const START_KEYWORDS: readonly StartKeyword[] = ['for', 'if', 'try', 'while', 'def', 'class', 'with', 'pypdef']
export const MIDDLE_KEYWORDS: readonly MiddleKeyword[] = ['elif', 'else', 'except', 'finally']

export function as_start_keyword(word: string): StartKeyword | undefined {
  return START_KEYWORDS.find(k => k === word)
}

export function as_middle_keyword(word: string): MiddleKeyword | undefined {
  return MIDDLE_KEYWORDS.find(k => k === word)
}

/** The start keyword a middle clause belongs to */
export function start_of(middle: MiddleKeyword): StartKeyword {
  switch (middle) {
    case 'elif':
    case 'else': return 'if'
    case 'except':
    case 'finally': return 'try'
  }
}

export type HeadRule = 'required' | 'optional' | 'forbidden'

/** What may sit between the keyword and the trailing ':' */
export function head_rule(keyword: Keyword): HeadRule {
  switch (keyword) {
    case 'for':
    case 'if':
    case 'while':
    case 'with':
    case 'def':
    case 'pypdef':
    case 'class':
    case 'elif':
      return 'required'
    case 'except':
      return 'optional'
    case 'try':
    case 'else':
    case 'finally':
      return 'forbidden'
  }
}

/**
 * The javascript line a directive turns into. Clauses after the first one close
 * the brace of the previous clause, the generator closes the last one.
 *
 * `def` directly inside `class` is a method.
 */
export function header_line(keyword: Keyword, head: string, parent: StartKeyword | null): string {
  switch (keyword) {
    case 'for': return `for (${head}) {`
    case 'if': return `if (${head}) {`
    case 'while': return `while (${head}) {`
    case 'with': return `with (${head}) {`
    case 'try': return 'try {'
    case 'class': return `class ${head} {`
    case 'def':
    case 'pypdef':
      return parent === 'class' ? `${head} {` : `function ${head} {`
    case 'elif': return `} else if (${head}) {`
    case 'else': return '} else {'
    case 'except': return head ? `} catch (${head}) {` : '} catch {'
    case 'finally': return '} finally {'
  }
}
