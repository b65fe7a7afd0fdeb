// Shared configuration: environment overrides for the swarm solver.

export {
  readSolverEnv,
  readEnvNumber,
  readEnvFlag,
  SOLVER_ENV_VARS,
  type SolverEnvOverrides,
  type SolverEnvKey,
  type EnvSource,
  type LogFormat,
} from './env.js'
