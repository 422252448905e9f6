import type { ControlSequence, Node, Sequence } from './nodes'

/**
 * Writes the parsed tree out as javascript, one line per statement or header.
 * The parser's line map counts on this order, so both have to agree.
 */
export class Emitter {
  source: string[] = []
  indent = 0

  static INDENT = '  '

  pushIndent() { this.indent++ }
  lowerIndent() { this.indent-- }

  emit(str: string) {
    this.source.push(str ? Emitter.INDENT.repeat(this.indent) + str : '')
  }

  emitVerbatim(str: string) {
    this.source.push(str)
  }

  emitNodes(nodes: Node[]) {
    for (const node of nodes) {
      if (node.kind === 'statement') {
        if (node.verbatim) this.emitVerbatim(node.text)
        else this.emit(node.text)
      } else {
        this.emitControl(node)
      }
    }
  }

  emitControl(ctl: ControlSequence) {
    for (const block of ctl.blocks) {
      this.emit(block.header)
      this.pushIndent()
      this.emitNodes(block.nodes)
      this.lowerIndent()
    }
    this.emit('}')
  }

  toString() {
    return this.source.join('\n')
  }
}

export function generate(root: Sequence): string {
  const emitter = new Emitter()
  emitter.emitNodes(root.nodes)
  return emitter.toString()
}
