import c from 'colors'

export function info(...a: unknown[]) {
  console.error(c.green(c.bold(' *')), ...a)
}

export function log(...a: unknown[]) {
  console.error(c.blue(' ?'), ...a)
}

export function warn(...a: unknown[]) {
  console.error(c.yellow(' !'), ...a)
}

export function error(...a: unknown[]) {
  console.error(c.red(c.bold(' !')), ...a)
}
