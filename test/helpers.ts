import fs from 'fs'
import os from 'os'
import path from 'path'

import { MemorySink } from '../src/format'
import { parse_and_run, RunOptions } from '../src/template'
import type { Node } from '../src/nodes'

/** Join lines the way a template file would have them */
export function tpl(...lines: string[]): string {
  return lines.join('\n')
}

export function run(text: string, opts: RunOptions = {}) {
  const sink = new MemorySink()
  const res = parse_and_run(text, 'test.tpl', { ...opts, sink })
  return { res, sink }
}

export function scratch_dir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'weft-'))
}

/** Nesting depth of control blocks in a tree */
export function depth(nodes: Node[]): number {
  let res = 0
  for (const n of nodes) {
    if (n.kind !== 'control') continue
    for (const b of n.blocks) res = Math.max(res, 1 + depth(b.nodes))
  }
  return res
}
