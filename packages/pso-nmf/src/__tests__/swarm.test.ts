/**
 * Tests for the random streams, configuration validation and swarm internals.
 */

import { describe, it, expect } from 'vitest'
import { createCounterStream, deriveTimeSeed } from '../prng.js'
import { validateConfig, resolveConfig } from '../schema.js'
import { initSwarm, stepParticle, reduceGlobalBest } from '../swarm.js'
import { InvalidConfigurationError } from '../errors.js'
import { DEFAULT_PSO_CONFIG, MAX_ITERATIONS } from '../types.js'
import type { Particle, PSOConfig } from '../types.js'

/** f(x) = sum(x_i^2) */
function sphereEnergy(state: Float64Array): number {
  let sum = 0
  for (let i = 0; i < state.length; i++) sum += state[i]! * state[i]!
  return sum
}

function makeParticle(position: number[], velocity: number[], bestCost: number): Particle {
  return {
    position: new Float64Array(position),
    velocity: new Float64Array(velocity),
    bestPosition: new Float64Array(position),
    bestCost,
  }
}

function configWith(overrides: Partial<PSOConfig>): PSOConfig {
  return { ...DEFAULT_PSO_CONFIG, ...overrides }
}

// ---------------------------------------------------------------------------
// Random streams
// ---------------------------------------------------------------------------

describe('createCounterStream', () => {
  it('returns the same value for the same coordinates regardless of draw order', () => {
    const stream = createCounterStream(42)
    const forward = [stream.uniform(1, 0, 0, 0), stream.uniform(1, 0, 1, 0), stream.uniform(2, 3, 4, 1)]
    const backward = [stream.uniform(2, 3, 4, 1), stream.uniform(1, 0, 1, 0), stream.uniform(1, 0, 0, 0)]
    expect(backward.reverse()).toEqual(forward)
    expect(createCounterStream(42).uniform(2, 3, 4, 1)).toBe(forward[2])
  })

  it('depends on every coordinate and on the seed', () => {
    const stream = createCounterStream(42)
    const base = stream.uniform(5, 6, 7, 0)
    expect(stream.uniform(6, 6, 7, 0)).not.toBe(base)
    expect(stream.uniform(5, 7, 7, 0)).not.toBe(base)
    expect(stream.uniform(5, 6, 8, 0)).not.toBe(base)
    expect(stream.uniform(5, 6, 7, 1)).not.toBe(base)
    expect(createCounterStream(43).uniform(5, 6, 7, 0)).not.toBe(base)
  })

  it('stays in [0, 1) with a mean near one half', () => {
    const stream = createCounterStream(9)
    let sum = 0
    const n = 5000
    for (let i = 0; i < n; i++) {
      const u = stream.uniform(i, i % 7, i % 13, i % 2)
      expect(u).toBeGreaterThanOrEqual(0)
      expect(u).toBeLessThan(1)
      sum += u
    }
    expect(Math.abs(sum / n - 0.5)).toBeLessThan(0.03)
  })
})

describe('deriveTimeSeed', () => {
  it('returns a non-zero uint32', () => {
    const seed = deriveTimeSeed()
    expect(Number.isInteger(seed)).toBe(true)
    expect(seed).toBeGreaterThan(0)
    expect(seed).toBeLessThanOrEqual(0xffffffff)
  })
})

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig({ ...DEFAULT_PSO_CONFIG })).toEqual(DEFAULT_PSO_CONFIG)
  })

  it('rejects inverted bounds on the upper bound field', () => {
    try {
      validateConfig(configWith({ lowerBound: 5, upperBound: 1 }))
      expect.unreachable('inverted bounds should be rejected')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError)
      if (err instanceof InvalidConfigurationError) {
        expect(Object.keys(err.fields)).toEqual(['upperBound'])
      }
    }
  })

  it('lists every bad field', () => {
    try {
      validateConfig(configWith({ population: 2.5, seed: -1, inertia: NaN }))
      expect.unreachable('bad fields should be rejected')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError)
      if (err instanceof InvalidConfigurationError) {
        expect(Object.keys(err.fields).sort()).toEqual(['inertia', 'population', 'seed'])
      }
    }
  })

  it('rejects a negative iteration budget and oversized seeds', () => {
    expect(() => validateConfig(configWith({ maxIterations: -1 }))).toThrow(InvalidConfigurationError)
    expect(() => validateConfig(configWith({ seed: 2 ** 32 }))).toThrow(InvalidConfigurationError)
  })

  it('caps the iteration budget', () => {
    expect(validateConfig(configWith({ maxIterations: MAX_ITERATIONS })).maxIterations).toBe(MAX_ITERATIONS)
    try {
      validateConfig(configWith({ maxIterations: 2 ** 33 }))
      expect.unreachable('an oversized budget should be rejected')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError)
      if (err instanceof InvalidConfigurationError) {
        expect(err.fields).toEqual({ maxIterations: [`Iteration budget must not exceed ${MAX_ITERATIONS}`] })
      }
    }
  })
})

describe('resolveConfig', () => {
  it('floors the population to two', () => {
    expect(resolveConfig(configWith({ population: 1, seed: 1 })).population).toBe(2)
    expect(resolveConfig(configWith({ population: 0, seed: 1 })).population).toBe(2)
    expect(resolveConfig(configWith({ population: -4, seed: 1 })).population).toBe(2)
    expect(resolveConfig(configWith({ population: 7, seed: 1 })).population).toBe(7)
  })

  it('replaces a zero seed and keeps any other', () => {
    expect(resolveConfig(configWith({ seed: 0 })).seed).toBeGreaterThan(0)
    expect(resolveConfig(configWith({ seed: 1234 })).seed).toBe(1234)
  })
})

// ---------------------------------------------------------------------------
// Swarm
// ---------------------------------------------------------------------------

describe('initSwarm', () => {
  const params = { ...DEFAULT_PSO_CONFIG, population: 6, lowerBound: 1, upperBound: 3 }

  it('draws positions in bounds and small velocities', () => {
    const particles = initSwarm(4, params, createCounterStream(11), sphereEnergy)
    expect(particles).toHaveLength(6)
    for (const p of particles) {
      expect(p.position).toHaveLength(4)
      for (let d = 0; d < 4; d++) {
        expect(p.position[d]).toBeGreaterThanOrEqual(1)
        expect(p.position[d]).toBeLessThanOrEqual(3)
        expect(Math.abs(p.velocity[d]!)).toBeLessThanOrEqual(0.2)
      }
      expect(Array.from(p.bestPosition)).toEqual(Array.from(p.position))
      expect(p.bestCost).toBe(sphereEnergy(p.position))
    }
  })

  it('is reproducible for a seed', () => {
    const a = initSwarm(3, params, createCounterStream(5), sphereEnergy)
    const b = initSwarm(3, params, createCounterStream(5), sphereEnergy)
    expect(a).toEqual(b)
  })
})

describe('stepParticle', () => {
  const params = { ...DEFAULT_PSO_CONFIG, inertia: 1, cognitive: 0, social: 0, lowerBound: 0, upperBound: 10 }
  const globalBest = { position: new Float64Array([0, 0]), cost: 0, particle: 0 }

  it('moves by the velocity and clamps to the bounds', () => {
    const p = makeParticle([1, 9.5], [0.5, 1], 200)
    stepParticle(p, 0, 0, globalBest, params, createCounterStream(1), sphereEnergy)
    expect(Array.from(p.position)).toEqual([1.5, 10])
    expect(Array.from(p.velocity)).toEqual([0.5, 1])
    expect(p.bestCost).toBe(102.25)
    expect(Array.from(p.bestPosition)).toEqual([1.5, 10])
  })

  it('keeps the personal best unless strictly improved', () => {
    const p = makeParticle([1, 1], [1, 1], 1)
    stepParticle(p, 0, 0, globalBest, params, createCounterStream(1), sphereEnergy)
    expect(Array.from(p.position)).toEqual([2, 2])
    expect(p.bestCost).toBe(1)
    expect(Array.from(p.bestPosition)).toEqual([1, 1])
  })

  it('clamps below the lower bound', () => {
    const p = makeParticle([0.25], [-1], 50)
    stepParticle(p, 0, 0, { ...globalBest, position: new Float64Array([0]) }, params, createCounterStream(1), sphereEnergy)
    expect(p.position[0]).toBe(0)
    expect(p.bestCost).toBe(0)
  })
})

describe('reduceGlobalBest', () => {
  it('picks the minimum and keeps the first of equal costs', () => {
    const particles = [makeParticle([5], [0], 5), makeParticle([3], [0], 3), makeParticle([-3], [0], 3)]
    const best = reduceGlobalBest(particles)
    expect(best.particle).toBe(1)
    expect(best.cost).toBe(3)
    expect(Array.from(best.position)).toEqual([3])
  })

  it('keeps the current best on a tie', () => {
    const current = { position: new Float64Array([9]), cost: 3, particle: 2 }
    const particles = [makeParticle([5], [0], 5), makeParticle([3], [0], 3)]
    expect(reduceGlobalBest(particles, current)).toBe(current)
  })

  it('replaces the current best on strict improvement', () => {
    const current = { position: new Float64Array([9]), cost: 4, particle: 0 }
    const particles = [makeParticle([5], [0], 5), makeParticle([3], [0], 3)]
    expect(reduceGlobalBest(particles, current).particle).toBe(1)
  })

  it('returns a copy of the winning position', () => {
    const particles = [makeParticle([1, 2], [0, 0], 1)]
    const best = reduceGlobalBest(particles)
    particles[0]!.bestPosition[0] = 100
    expect(Array.from(best.position)).toEqual([1, 2])
  })

  it('falls back to the first particle when no cost is finite', () => {
    const particles = [makeParticle([1], [0], NaN), makeParticle([2], [0], NaN)]
    const best = reduceGlobalBest(particles)
    expect(best.particle).toBe(0)
    expect(best.cost).toBeNaN()
  })
})
