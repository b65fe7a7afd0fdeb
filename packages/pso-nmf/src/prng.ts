/**
 * Random number generation for the swarm.
 *
 * `createCounterStream` is a stateless hash of (seed, step, particle,
 * dimension, lane), so a particle's draws do not depend on the order
 * particles are updated in.
 */

import type { CounterStream } from './types.js'

const UINT32_RANGE = 4294967296

/** murmur3 32-bit finalizer */
function fmix32(h: number): number {
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b)
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35)
  return (h ^ (h >>> 16)) >>> 0
}

function absorb(h: number, word: number): number {
  return fmix32((h ^ Math.imul(word | 0, 0x9e3779b1)) + 0x7f4a7c15)
}

/** Index-addressable uniform stream in [0, 1) */
export function createCounterStream(seed: number): CounterStream {
  const key = fmix32((seed >>> 0) ^ 0x5bd1e995)
  return {
    uniform(step, particle, dimension, lane) {
      let h = absorb(key, step)
      h = absorb(h, particle)
      h = absorb(h, dimension)
      h = absorb(h, lane)
      return h / UINT32_RANGE
    },
  }
}

/** Non-zero uint32 seed from the clock, used when the configured seed is 0. */
export function deriveTimeSeed(): number {
  const wall = Date.now() >>> 0
  const fine = Math.floor(performance.now() * 1000) >>> 0
  return fmix32(wall ^ Math.imul(fine, 0x27d4eb2f)) || 1
}
