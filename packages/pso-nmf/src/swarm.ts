/**
 * Swarm state and the per-iteration update.
 *
 * Each iteration is synchronous: every particle moves against the same
 * global best (the one from the end of the previous iteration), then the
 * global best is recomputed by a min-reduction over personal bests.
 * Together with the counter-addressed random stream, particle updates
 * within one iteration are independent of each other.
 */

import type { CostFunction, CounterStream, GlobalBest, Particle } from './types.js'
import { INITIAL_VELOCITY_SCALE } from './types.js'
import type { ResolvedConfig } from './schema.js'

// ---------------------------------------------------------------------------
// Random stream lanes
// ---------------------------------------------------------------------------

/** Step index used for initialization; iteration t draws at step t + 1 */
const INIT_STEP = 0

const LANE_POSITION = 0
const LANE_VELOCITY_A = 1
const LANE_VELOCITY_B = 2

const LANE_R1 = 0
const LANE_R2 = 1

type SwarmParams = Pick<
  ResolvedConfig,
  'population' | 'inertia' | 'cognitive' | 'social' | 'lowerBound' | 'upperBound'
>

function clamp(v: number, lo: number, hi: number): number {
  if (v < lo) return lo
  if (v > hi) return hi
  return v
}

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

/**
 * Uniform positions in [lb, ub], small velocities from the difference of two
 * uniform draws, personal bests set to the starting point.
 */
export function initSwarm(
  dim: number,
  params: SwarmParams,
  stream: CounterStream,
  costFn: CostFunction,
): Particle[] {
  const { population, lowerBound: lb, upperBound: ub } = params
  const span = ub - lb
  const particles: Particle[] = []

  for (let p = 0; p < population; p++) {
    const position = new Float64Array(dim)
    const velocity = new Float64Array(dim)
    for (let d = 0; d < dim; d++) {
      position[d] = clamp(lb + span * stream.uniform(INIT_STEP, p, d, LANE_POSITION), lb, ub)
      const a = lb + span * stream.uniform(INIT_STEP, p, d, LANE_VELOCITY_A)
      const b = lb + span * stream.uniform(INIT_STEP, p, d, LANE_VELOCITY_B)
      velocity[d] = (a - b) * INITIAL_VELOCITY_SCALE
    }
    particles.push({
      position,
      velocity,
      bestPosition: new Float64Array(position),
      bestCost: costFn(position),
    })
  }

  return particles
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

/**
 * Move one particle for iteration `iteration` and refresh its personal best.
 * Reads `globalBest` but never writes it.
 */
export function stepParticle(
  particle: Particle,
  index: number,
  iteration: number,
  globalBest: Readonly<GlobalBest>,
  params: SwarmParams,
  stream: CounterStream,
  costFn: CostFunction,
): void {
  const { inertia, cognitive, social, lowerBound: lb, upperBound: ub } = params
  const { position: x, velocity: v, bestPosition: pbest } = particle
  const gbest = globalBest.position
  const step = iteration + 1

  for (let d = 0; d < x.length; d++) {
    const r1 = stream.uniform(step, index, d, LANE_R1)
    const r2 = stream.uniform(step, index, d, LANE_R2)
    const xd = x[d]!
    const vd = inertia * v[d]! + cognitive * r1 * (pbest[d]! - xd) + social * r2 * (gbest[d]! - xd)
    v[d] = vd
    x[d] = clamp(xd + vd, lb, ub)
  }

  const cost = costFn(x)
  if (cost < particle.bestCost) {
    particle.bestCost = cost
    pbest.set(x)
  }
}

// ---------------------------------------------------------------------------
// Global best reduction
// ---------------------------------------------------------------------------

/**
 * Fold personal bests into the global best. Replacement needs a strictly
 * lower cost, so ties keep the earlier particle and the result never worsens.
 * The returned position is a copy, not a view into a particle.
 */
export function reduceGlobalBest(particles: readonly Particle[], current?: GlobalBest): GlobalBest {
  let bestCost = current ? current.cost : Infinity
  let bestIndex = -1

  for (let p = 0; p < particles.length; p++) {
    const cost = particles[p]!.bestCost
    if (cost < bestCost) {
      bestCost = cost
      bestIndex = p
    }
  }

  const winner = particles[bestIndex]
  if (winner) {
    return { position: new Float64Array(winner.bestPosition), cost: winner.bestCost, particle: bestIndex }
  }
  if (current) return current

  // No finite cost anywhere: report the first particle so there is still a position
  const first = particles[0]
  if (!first) throw new RangeError('Swarm must contain at least one particle')
  return { position: new Float64Array(first.bestPosition), cost: first.bestCost, particle: 0 }
}
