/**
 * Core types for the particle swarm coefficient solver.
 *
 * The solver fits H in X ≈ W·H with bound-constrained entries, so the
 * types split into matrices, solver configuration, and run results.
 */

import type { LogFormat } from '@swarm-nmf/config'

export type { LogFormat }

// ---------------------------------------------------------------------------
// Matrices
// ---------------------------------------------------------------------------

/** Dense matrix with row-major storage: entry (r, c) lives at data[r * cols + c] */
export interface Matrix {
  rows: number
  cols: number
  data: Float64Array
}

/** Anything `fit` accepts as a matrix: nested rows or a dense Matrix */
export type MatrixInput = ReadonlyArray<ReadonlyArray<number>> | Matrix

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface PSOConfig {
  /** Swarm size. Values below 2 are floored to 2. */
  population: number
  /** Fixed iteration budget; there is no early stop */
  maxIterations: number
  /** Inertia weight applied to the previous velocity */
  inertia: number
  /** Pull toward the particle's own best position */
  cognitive: number
  /** Pull toward the swarm's best position */
  social: number
  /** Lower bound for every entry of H (0 gives non-negative H) */
  lowerBound: number
  /** Upper bound for every entry of H */
  upperBound: number
  verbose: boolean
  /** uint32 seed. 0 means "derive from the clock" and is resolved when set. */
  seed: number
  /** Format of progress lines written to stdout when verbose */
  logFormat: LogFormat
}

/** Constriction-style defaults (Clerc & Kennedy) */
export const DEFAULT_PSO_CONFIG: Readonly<PSOConfig> = Object.freeze({
  population: 30,
  maxIterations: 500,
  inertia: 0.729,
  cognitive: 1.49445,
  social: 1.49445,
  lowerBound: 0,
  upperBound: 10,
  verbose: false,
  seed: 0,
  logFormat: 'text',
})

/** Smallest swarm the solver will run */
export const MIN_POPULATION = 2

/** Largest iteration budget accepted; the per-iteration cost history is allocated up front */
export const MAX_ITERATIONS = 10_000_000

/** Scale of the initial velocity relative to the bound range */
export const INITIAL_VELOCITY_SCALE = 0.1

/** Progress is reported on every iteration index divisible by this, and on the last one */
export const PROGRESS_INTERVAL = 50

// ---------------------------------------------------------------------------
// Random streams
// ---------------------------------------------------------------------------

/**
 * Index-addressable uniform stream. The same coordinates always give the
 * same number, independent of the order in which draws are made.
 */
export interface CounterStream {
  uniform(step: number, particle: number, dimension: number, lane: number): number
}

// ---------------------------------------------------------------------------
// Swarm state
// ---------------------------------------------------------------------------

export interface Particle {
  position: Float64Array
  velocity: Float64Array
  bestPosition: Float64Array
  /** +Infinity until evaluated */
  bestCost: number
}

export interface GlobalBest {
  position: Float64Array
  cost: number
  /** Index of the particle whose personal best this is */
  particle: number
}

/** Cost of a flattened (column-major) candidate H */
export type CostFunction = (flat: Float64Array) => number

// ---------------------------------------------------------------------------
// Progress and results
// ---------------------------------------------------------------------------

export interface ProgressEvent {
  iteration: number
  bestCost: number
}

export type ProgressListener = (event: ProgressEvent) => void

export interface FitOptions {
  /** Called at the progress cadence whether or not verbose is set */
  onProgress?: ProgressListener
}

export interface PSOResult {
  /** Best coefficient matrix found, k×s as nested rows */
  H: number[][]
  bestCost: number
  /** Global-best cost before the first iteration */
  initialCost: number
  /** Global-best cost after each iteration */
  costHistory: Float64Array
  iterations: number
  /** Effective swarm size after flooring */
  population: number
  /** Seed the run used */
  seed: number
}
