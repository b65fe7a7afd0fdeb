/** Environment overrides for solver defaults and progress logging. */

export type LogFormat = 'text' | 'json'

/** Raw overrides read from the environment. Unset variables are omitted. */
export interface SolverEnvOverrides {
  population?: number
  maxIterations?: number
  inertia?: number
  cognitive?: number
  social?: number
  lowerBound?: number
  upperBound?: number
  verbose?: boolean
  seed?: number
  logFormat?: LogFormat
}

export type SolverEnvKey = keyof SolverEnvOverrides

/** Variable name for each override. */
export const SOLVER_ENV_VARS: Record<SolverEnvKey, string> = {
  population: 'PSO_NMF_POPULATION',
  maxIterations: 'PSO_NMF_MAX_ITERATIONS',
  inertia: 'PSO_NMF_INERTIA',
  cognitive: 'PSO_NMF_COGNITIVE',
  social: 'PSO_NMF_SOCIAL',
  lowerBound: 'PSO_NMF_LOWER_BOUND',
  upperBound: 'PSO_NMF_UPPER_BOUND',
  verbose: 'PSO_NMF_VERBOSE',
  seed: 'PSO_NMF_SEED',
  logFormat: 'PSO_NMF_LOG_FORMAT',
}

export type EnvSource = Readonly<Record<string, string | undefined>>

function processEnv(): EnvSource {
  if (typeof process !== 'undefined' && process.env) return process.env
  return {}
}

function optional(env: EnvSource, key: string): string | undefined {
  const val = env[key]?.trim()
  return val ? val : undefined
}

/** Read a numeric variable. Throws with the variable name when it does not parse. */
export function readEnvNumber(env: EnvSource, key: string): number | undefined {
  const raw = optional(env, key)
  if (raw === undefined) return undefined
  const val = Number(raw)
  if (!Number.isFinite(val)) {
    throw new Error(`Invalid numeric environment variable: ${key}=${raw}.`)
  }
  return val
}

/** Read a boolean variable: true/1 or false/0. */
export function readEnvFlag(env: EnvSource, key: string): boolean | undefined {
  const raw = optional(env, key)
  if (raw === undefined) return undefined
  if (raw === 'true' || raw === '1') return true
  if (raw === 'false' || raw === '0') return false
  throw new Error(`Invalid boolean environment variable: ${key}=${raw}. Use true, false, 1 or 0.`)
}

function readLogFormat(env: EnvSource, key: string): LogFormat | undefined {
  const raw = optional(env, key)
  if (raw === undefined) return undefined
  if (raw === 'text' || raw === 'json') return raw
  throw new Error(`Invalid log format in ${key}: ${raw}. Use text or json.`)
}

/**
 * Collect solver overrides from the environment.
 * Only variables that are set appear in the result, so it can be spread over defaults.
 */
export function readSolverEnv(env: EnvSource = processEnv()): SolverEnvOverrides {
  const out: SolverEnvOverrides = {}

  const numericKeys = [
    'population',
    'maxIterations',
    'inertia',
    'cognitive',
    'social',
    'lowerBound',
    'upperBound',
    'seed',
  ] as const
  for (const key of numericKeys) {
    const val = readEnvNumber(env, SOLVER_ENV_VARS[key])
    if (val !== undefined) out[key] = val
  }

  const verbose = readEnvFlag(env, SOLVER_ENV_VARS.verbose)
  if (verbose !== undefined) out.verbose = verbose

  const logFormat = readLogFormat(env, SOLVER_ENV_VARS.logFormat)
  if (logFormat !== undefined) out.logFormat = logFormat

  return out
}
