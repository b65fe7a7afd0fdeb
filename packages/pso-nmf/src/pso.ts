import type { FitOptions, LogFormat, MatrixInput, PSOConfig, PSOResult } from './types.js'
import { DEFAULT_PSO_CONFIG } from './types.js'
import { readSolverEnv } from '@swarm-nmf/config'
import type { EnvSource } from '@swarm-nmf/config'
import { validateConfig } from './schema.js'
import { deriveTimeSeed } from './prng.js'
import { optimizeCoefficients } from './optimize.js'

function withResolvedSeed(config: PSOConfig): PSOConfig {
  return config.seed === 0 ? { ...config, seed: deriveTimeSeed() } : config
}

/**
 * Stateful solver: holds a configuration that setters may change between
 * fits. Each `fit` works on a snapshot, so the configuration is fixed for
 * the duration of a run.
 *
 * A seed of 0 is replaced with a clock-derived seed as soon as it is set,
 * so `getConfig().seed` always names the seed the next fit will use.
 */
export class PSO {
  private config: PSOConfig

  constructor(config: Partial<PSOConfig> = {}) {
    this.config = withResolvedSeed(validateConfig({ ...DEFAULT_PSO_CONFIG, ...config }))
  }

  /** Defaults, overlaid with PSO_NMF_* environment variables, then `overrides`. */
  static fromEnv(env?: EnvSource, overrides: Partial<PSOConfig> = {}): PSO {
    return new PSO({ ...readSolverEnv(env), ...overrides })
  }

  getConfig(): Readonly<PSOConfig> {
    return Object.freeze({ ...this.config })
  }

  /** Fit H for X ≈ W·H. Returns H as k×s nested rows. */
  fit(W: MatrixInput, X: MatrixInput): number[][] {
    return this.fitDetailed(W, X).H
  }

  /** Fit H and return the run telemetry alongside it. */
  fitDetailed(W: MatrixInput, X: MatrixInput, options: FitOptions = {}): PSOResult {
    return optimizeCoefficients(W, X, { ...this.config }, options)
  }

  /** Values below 2 are floored to 2 when the fit runs. */
  setPopulation(population: number): void {
    this.config.population = population
  }

  setMaxIterations(maxIterations: number): void {
    this.config.maxIterations = maxIterations
  }

  setInertia(inertia: number): void {
    this.config.inertia = inertia
  }

  setCognitive(cognitive: number): void {
    this.config.cognitive = cognitive
  }

  setSocial(social: number): void {
    this.config.social = social
  }

  setBounds(lowerBound: number, upperBound: number): void {
    this.config.lowerBound = lowerBound
    this.config.upperBound = upperBound
  }

  setVerbose(verbose: boolean): void {
    this.config.verbose = verbose
  }

  setLogFormat(logFormat: LogFormat): void {
    this.config.logFormat = logFormat
  }

  setSeed(seed: number): void {
    this.config = withResolvedSeed({ ...this.config, seed })
  }
}
