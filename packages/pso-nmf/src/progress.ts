/**
 * Progress reporting.
 *
 * One line per event on stdout. `text` is the human-readable default;
 * `json` writes one object per line with `ts` (ISO timestamp), `solver`,
 * `iter` and `bestCost`, for log aggregators that read JSON from stdout.
 */

import type { LogFormat, ProgressEvent, ProgressListener } from './types.js'
import { PROGRESS_INTERVAL } from './types.js'

/** True on every PROGRESS_INTERVAL-th iteration and on the final one. */
export function isProgressIteration(iteration: number, maxIterations: number): boolean {
  return iteration % PROGRESS_INTERVAL === 0 || iteration === maxIterations - 1
}

export function formatProgress(event: ProgressEvent, format: LogFormat, now: Date = new Date()): string {
  if (format === 'json') {
    return JSON.stringify({
      ts: now.toISOString(),
      solver: 'pso',
      iter: event.iteration,
      bestCost: event.bestCost,
    })
  }
  return `[PSO] iter: ${event.iteration} best_cost: ${event.bestCost}`
}

/** Listener that writes formatted progress lines to a stream (stdout by default). */
export function createStdoutReporter(
  format: LogFormat,
  write: (line: string) => void = line => {
    process.stdout.write(line)
  },
): ProgressListener {
  return event => {
    write(formatProgress(event, format) + '\n')
  }
}
