/**
 * Shared test helpers: a seeded sequential PRNG and random problem data.
 */

import type { Matrix } from '../types.js'

export interface TestRng {
  /** Returns a uniform random number in [0, 1) */
  random(): number
}

/** xorshift32 stream for reproducible test data */
export function createTestRng(seed: number): TestRng {
  let state = seed >>> 0 || 0x9e3779b9
  return {
    random() {
      state ^= state << 13
      state ^= state >>> 17
      state ^= state << 5
      state >>>= 0
      return state / 4294967296
    },
  }
}

/** Matrix with entries uniform in [lo, hi), drawn row by row. */
export function randomMatrix(rows: number, cols: number, rng: TestRng, lo = 0, hi = 1): Matrix {
  const data = new Float64Array(rows * cols)
  for (let i = 0; i < data.length; i++) {
    data[i] = lo + (hi - lo) * rng.random()
  }
  return { rows, cols, data }
}
