/**
 * Correspondence from generated javascript lines to template lines.
 *
 * The parser fills it in the same order the emitter writes lines, one call per
 * generated line. Lines reserved with `synthetic()` have no template counterpart.
 */
export class LineMap {
  private mapping = new Map<number, number>()

  /** the generated line the next call will describe */
  next_line = 1

  map(source_line: number): number {
    const generated = this.next_line++
    this.mapping.set(generated, source_line)
    return generated
  }

  synthetic(): number {
    return this.next_line++
  }

  lookup(generated_line: number): number | undefined {
    return this.mapping.get(generated_line)
  }

  entries(): [number, number][] {
    return [...this.mapping.entries()]
  }

  get size() {
    return this.mapping.size
  }
}
