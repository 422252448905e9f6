import fs from 'fs'
import path from 'path'
import sh from 'shelljs'

/**
 * Where the lines written by a template go.
 * `close` is called exactly once, telling whether the run succeeded.
 */
export interface OutputSink {
  write(line: string): void
  close(success: boolean): void
}

export class StreamSink implements OutputSink {
  constructor(public stream: NodeJS.WritableStream) { }

  write(line: string) {
    this.stream.write(line + '\n')
  }

  close(_success: boolean) { }
}

export class MemorySink implements OutputSink {
  lines: string[] = []
  success: boolean | null = null

  write(line: string) {
    this.lines.push(line)
  }

  close(success: boolean) {
    this.success = success
  }

  get text() {
    return this.lines.map(l => l + '\n').join('')
  }
}

/**
 * Writes to `<destination>.tmp` and only moves it over the destination once the
 * template ran to completion. A failed run removes the temporary file, so the
 * destination is either the previous output or the complete new one.
 */
export class FileSink implements OutputSink {
  temp: string
  fd: number

  constructor(public destination: string) {
    this.temp = destination + '.tmp'
    const made = sh.mkdir('-p', path.dirname(destination))
    if (made.code !== 0) throw new Error(`could not create the directory of ${destination}: ${made.stderr.trim()}`)
    this.fd = fs.openSync(this.temp, 'w')
  }

  write(line: string) {
    fs.writeSync(this.fd, line + '\n')
  }

  close(success: boolean) {
    fs.closeSync(this.fd)
    const res = success
      ? sh.mv(this.temp, this.destination)
      : sh.rm('-f', this.temp)
    if (res.code !== 0) {
      throw new Error(`could not ${success ? 'move' : 'remove'} ${this.temp}: ${res.stderr.trim()}`)
    }
  }
}
