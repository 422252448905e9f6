import { performance } from 'perf_hooks'
import c from 'colors'

/** Returns a clock for the debug log, each reading is the time since the previous one */
export function init_timer(): () => string {
  let since = performance.now()
  return () => {
    const now = performance.now()
    const elapsed = Math.round(100 * (now - since)) / 100
    since = now
    return `${c.bold(c.green(String(elapsed)))}ms`
  }
}
