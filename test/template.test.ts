import fs from 'fs'
import path from 'path'
import { describe, expect, it } from 'vitest'

import { parse_and_run } from '../src/template'
import { MemorySink } from '../src/format'
import { run, scratch_dir, tpl } from './helpers'

describe('parse_and_run', () => {
  it('runs loops and conditionals', () => {
    const { res, sink } = run(tpl(
      '% const xs = [1, 2, 3]',
      '%for const x of xs:',
      '%if x % 2:',
      '${x} odd',
      '%else:',
      '${x} even',
      '%endif',
      '%endfor',
    ))
    expect(res.ok).toBe(true)
    expect(sink.lines).toEqual(['1 odd', '2 even', '3 odd'])
  })

  it('runs while, try, with and classes', () => {
    const { res, sink } = run(tpl(
      '% let i = 0',
      '%while i < 2:',
      'i=${i}',
      '% i++',
      '%endwhile',
      '%try:',
      `% throw new Error('inner')`,
      '%except e:',
      'caught ${e.message}',
      '%finally:',
      'done',
      '%endtry',
      '%with ({ a: 1 }):',
      'a is ${a}',
      '%endwith',
      '%class Greeter:',
      '%def hello(name):',
      `% return 'hello ' + name`,
      '%enddef',
      '%endclass',
      `\${new Greeter().hello('bob')}`,
    ))
    expect(res.ok).toBe(true)
    expect(sink.lines).toEqual(['i=0', 'i=1', 'caught inner', 'done', 'a is 1', 'hello bob'])
  })

  it('returns what a pypdef accumulated', () => {
    const { res, sink } = run(tpl(
      '%pypdef greet(n):',
      'Hi ${n}',
      '%for const i of [1, 2]:',
      '#${i}',
      '%endfor',
      '%endpypdef',
      `\${greet('ann')}`,
    ))
    expect(res.ok).toBe(true)
    expect(sink.lines).toEqual(['Hi ann\n#1\n#2'])
  })

  it('runs raw javascript blocks', () => {
    const { sink } = run(tpl(
      '<%',
      '  const s = `first',
      '    kept as is',
      '  last`',
      '  Σ(s)',
      '%>',
    ))
    expect(sink.lines).toEqual(['first\n    kept as is\n  last'])
  })

  it('binds variables and argv', () => {
    const { sink } = run(tpl('Hi ${who}', '${argv.join(",")}'), { vars: { who: 'there' }, argv: ['test.tpl', 'a', 'b'] })
    expect(sink.lines).toEqual(['Hi there', 'test.tpl,a,b'])
  })

  it('defaults argv to the input name', () => {
    const { sink } = run('${argv.length} ${argv[0]}')
    expect(sink.lines).toEqual(['1 test.tpl'])
  })

  it('evaluates a multi-line expression on its first line', () => {
    const { sink } = run(tpl('sum: ${1 +', '  2}', 'next'))
    expect(sink.lines).toEqual(['sum: 3', 'next'])
  })

  it('runs statements using recent regular expression flags', () => {
    const { res, sink } = run(tpl('% const r = /[\\p{L}--[a-z]]/v', '${r.test("é")} ${r.test("e")}'))
    expect(res.ok).toBe(true)
    expect(sink.lines).toEqual(['true false'])
  })

  it('writes text after a multi-line expression as a line of its own', () => {
    const { sink } = run(tpl('x ${1 +', '2} tail'))
    expect(sink.lines).toEqual(['x 3', ' tail'])
  })

  it('reports a failure in text after a multi-line expression at its own line', () => {
    const { res } = run(tpl('${1 +', '2} ${nope()}'))
    expect(res.ok).toBe(false)
    if (res.ok) return
    expect(res.diagnostic.line).toBe(2)
    expect(res.diagnostic.source).toBe('2} ${nope()}')
  })

  describe('failures', () => {
    it('stops at a parse error before running anything', () => {
      const { res, sink } = run(tpl('a', '%endif'))
      expect(res).toEqual({
        ok: false,
        diagnostic: {
          kind: 'parse',
          file: 'test.tpl',
          line: 2,
          source: '%endif',
          generated_line: null,
          name: 'ParseError',
          message: `found '%endif' without an open '%if'`,
          trace: [],
        },
      })
      expect(sink.success).toBeNull()
      expect(sink.lines).toEqual([])
    })

    it('cites the template line of a runtime failure, not the generated one', () => {
      const { res, sink } = run(tpl(
        '%pypdef boom(n):',
        '${n.missing.deep}',
        '%endpypdef',
        'Header',
        '% boom({})',
      ))
      expect(res.ok).toBe(false)
      if (res.ok) return
      const d = res.diagnostic
      expect(d.kind).toBe('runtime')
      expect(d.line).toBe(2)
      expect(d.source).toBe('${n.missing.deep}')
      expect(d.generated_line).toBe(3)
      expect(d.name).toBe('TypeError')
      expect(d.trace.map(t => t.line)).toEqual([2, 5])
      expect(sink.lines).toEqual(['Header'])
      expect(sink.success).toBe(false)
    })

    it('cites the template line of a syntax failure', () => {
      const { res } = run(tpl('ok', 'Value ${1 +}', 'more'))
      expect(res.ok).toBe(false)
      if (res.ok) return
      expect(res.diagnostic.kind).toBe('syntax')
      expect(res.diagnostic.line).toBe(2)
      expect(res.diagnostic.source).toBe('Value ${1 +}')
      expect(res.diagnostic.name).toBe('SyntaxError')
    })

    it('cites the raw first line of a multi-line expression', () => {
      const { res } = run(tpl('a', '${undefined_thing +', '  1}', 'b'))
      expect(res.ok).toBe(false)
      if (res.ok) return
      expect(res.diagnostic.line).toBe(2)
      expect(res.diagnostic.source).toBe('${undefined_thing +')
      expect(res.diagnostic.name).toBe('ReferenceError')
    })

    it('keeps line separators in text from shifting the failing line', () => {
      const { res, sink } = run(tpl('a\u2028b', '${nope()}', 'innocent line'))
      expect(res.ok).toBe(false)
      if (res.ok) return
      expect(res.diagnostic.line).toBe(2)
      expect(res.diagnostic.source).toBe('${nope()}')
      expect(sink.lines).toEqual(['a\u2028b'])
    })

    it('does not guess a line it cannot map', () => {
      const { res } = run(tpl('a', `% throw 'plain string'`))
      expect(res.ok).toBe(false)
      if (res.ok) return
      expect(res.diagnostic.line).toBeNull()
      expect(res.diagnostic.source).toBeNull()
      expect(res.diagnostic.message).toBe('plain string')
    })
  })

  describe('files', () => {
    it('writes the output and the generated javascript', () => {
      const dir = scratch_dir()
      const output = path.join(dir, 'out', 'result.txt')
      const dump = path.join(dir, 'gen', 'result.js')
      const res = parse_and_run(tpl('a', 'b ${1 + 1}'), 'in.tpl', { output, dump })
      expect(res.ok).toBe(true)
      expect(fs.readFileSync(output, 'utf-8')).toBe('a\nb 2\n')
      expect(fs.readFileSync(dump, 'utf-8')).toBe('Σ("a")\nΣ(`b ${(1 + 1)}`)\n')
      expect(fs.existsSync(output + '.tmp')).toBe(false)
    })

    it('maps failures of a dumped unit', () => {
      const dir = scratch_dir()
      const dump = path.join(dir, 'unit.js')
      const res = parse_and_run(tpl('x', '${nope()}'), 'in.tpl', { dump, sink: new MemorySink() })
      expect(res.ok).toBe(false)
      if (res.ok) return
      expect(res.diagnostic.line).toBe(2)
    })

    it('never touches the destination when the template fails', () => {
      const dir = scratch_dir()
      const output = path.join(dir, 'result.txt')
      fs.writeFileSync(output, 'previous\n')
      const res = parse_and_run(tpl('partial', '${nope()}'), 'in.tpl', { output })
      expect(res.ok).toBe(false)
      expect(fs.readFileSync(output, 'utf-8')).toBe('previous\n')
      expect(fs.existsSync(output + '.tmp')).toBe(false)
    })

    it('creates no output at all on a parse error', () => {
      const dir = scratch_dir()
      const output = path.join(dir, 'result.txt')
      const res = parse_and_run('%if x:', 'in.tpl', { output })
      expect(res.ok).toBe(false)
      expect(fs.existsSync(output)).toBe(false)
      expect(fs.existsSync(output + '.tmp')).toBe(false)
    })
  })
})
