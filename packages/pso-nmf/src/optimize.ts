/**
 * Particle Swarm Optimization for the NMF coefficient matrix.
 *
 * Given W (g×k) and X (g×s), searches for H (k×s) minimizing
 *   ‖X − W·H‖²_F   subject to  lb ≤ H ≤ ub
 *
 * Particles live in R^{k·s} (column-major encoding of H). Every iteration:
 *   v ← ω·v + c1·r1·(pbest − x) + c2·r2·(gbest − x)
 *   x ← clamp(x + v, lb, ub)
 * followed by a personal-best update per particle and a global-best
 * reduction over the swarm. The run stops after a fixed iteration budget.
 *
 * Reference: Kennedy & Eberhart (1995), "Particle Swarm Optimization";
 *   constriction defaults from Clerc & Kennedy (2002).
 */

import type { FitOptions, MatrixInput, PSOConfig, PSOResult, ProgressListener } from './types.js'
import { toMatrix, toRows, unflattenColumnMajor } from './matrix.js'
import { createCostFunction } from './cost.js'
import { createCounterStream } from './prng.js'
import { resolveConfig } from './schema.js'
import { initSwarm, stepParticle, reduceGlobalBest } from './swarm.js'
import { createStdoutReporter, isProgressIteration } from './progress.js'
import { ShapeMismatchError, NumericInstabilityError } from './errors.js'

/**
 * Run the swarm and return H together with run telemetry.
 *
 * @throws ShapeMismatchError if W or X is not a rank-2 matrix, or their row counts differ
 * @throws InvalidConfigurationError if the configuration fails validation
 * @throws NumericInstabilityError if an input holds a non-finite entry, or no finite cost was found
 */
export function optimizeCoefficients(
  W: MatrixInput,
  X: MatrixInput,
  config: PSOConfig,
  options: FitOptions = {},
): PSOResult {
  const w = toMatrix(W, 'W')
  const x = toMatrix(X, 'X')
  if (w.rows !== x.rows) {
    throw new ShapeMismatchError('W and X', `W has ${w.rows} rows but X has ${x.rows}`)
  }
  const cfg = resolveConfig(config)

  const k = w.cols
  const s = x.cols
  const costFn = createCostFunction(w, x, cfg.lowerBound)
  const stream = createCounterStream(cfg.seed)

  const listeners: ProgressListener[] = []
  if (options.onProgress) listeners.push(options.onProgress)
  if (cfg.verbose) listeners.push(createStdoutReporter(cfg.logFormat))

  // --- Initialization ---
  const particles = initSwarm(k * s, cfg, stream, costFn)
  let globalBest = reduceGlobalBest(particles)
  const initialCost = globalBest.cost

  // --- Main loop ---
  const costHistory = new Float64Array(cfg.maxIterations)
  for (let iter = 0; iter < cfg.maxIterations; iter++) {
    for (let p = 0; p < particles.length; p++) {
      stepParticle(particles[p]!, p, iter, globalBest, cfg, stream, costFn)
    }
    globalBest = reduceGlobalBest(particles, globalBest)
    costHistory[iter] = globalBest.cost

    if (listeners.length > 0 && isProgressIteration(iter, cfg.maxIterations)) {
      const event = { iteration: iter, bestCost: globalBest.cost }
      for (const listener of listeners) listener(event)
    }
  }

  if (!Number.isFinite(globalBest.cost)) {
    throw new NumericInstabilityError('search', `best cost is ${globalBest.cost}; inputs or bounds overflow`)
  }

  return {
    H: toRows(unflattenColumnMajor(globalBest.position, k, s)),
    bestCost: globalBest.cost,
    initialCost,
    costHistory,
    iterations: cfg.maxIterations,
    population: cfg.population,
    seed: cfg.seed,
  }
}
