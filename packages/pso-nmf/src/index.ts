/**
 * @swarm-nmf/pso
 *
 * Particle Swarm Optimization for the coefficient matrix of a non-negative
 * factorization: given W and X, find bounded H minimizing ‖X − W·H‖²_F.
 */

// Types
export * from './types.js'

// Errors
export { ShapeMismatchError, InvalidConfigurationError, NumericInstabilityError } from './errors.js'

// Solver
export { PSO } from './pso.js'
export { optimizeCoefficients } from './optimize.js'

// Configuration
export { psoConfigSchema, validateConfig, resolveConfig } from './schema.js'
export type { ResolvedConfig } from './schema.js'

// Matrices and particle encoding
export {
  toMatrix,
  matrixFromRows,
  toRows,
  flattenColumnMajor,
  unflattenColumnMajor,
  multiply,
} from './matrix.js'

// Cost
export { createCostFunction, reconstructionError } from './cost.js'

// Random streams
export { createCounterStream, deriveTimeSeed } from './prng.js'

// Swarm internals
export { initSwarm, stepParticle, reduceGlobalBest } from './swarm.js'

// Progress
export { createStdoutReporter, formatProgress, isProgressIteration } from './progress.js'
