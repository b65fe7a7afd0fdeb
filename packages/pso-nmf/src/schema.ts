import { z } from 'zod'
import type { PSOConfig } from './types.js'
import { MAX_ITERATIONS, MIN_POPULATION } from './types.js'
import { InvalidConfigurationError } from './errors.js'
import { deriveTimeSeed } from './prng.js'

const finite = () => z.number().finite()

export const psoConfigSchema = z
  .object({
    population: z.number().int('Population must be an integer'),
    maxIterations: z
      .number()
      .int('Iteration budget must be an integer')
      .min(0)
      .max(MAX_ITERATIONS, `Iteration budget must not exceed ${MAX_ITERATIONS}`),
    inertia: finite(),
    cognitive: finite().min(0),
    social: finite().min(0),
    lowerBound: finite(),
    upperBound: finite(),
    verbose: z.boolean(),
    seed: z.number().int().min(0).max(0xffffffff, 'Seed must fit in 32 bits'),
    logFormat: z.enum(['text', 'json']),
  })
  .refine(cfg => cfg.lowerBound <= cfg.upperBound, {
    message: 'Upper bound must not be below the lower bound',
    path: ['upperBound'],
  })

/** Validated configuration with the population floored and a non-zero seed. */
export type ResolvedConfig = Readonly<PSOConfig>

/** Validate a full configuration. Throws InvalidConfigurationError listing each bad field. */
export function validateConfig(config: PSOConfig): PSOConfig {
  const result = psoConfigSchema.safeParse(config)
  if (!result.success) {
    const fields: Record<string, string[]> = {}
    for (const [field, messages] of Object.entries(result.error.flatten().fieldErrors)) {
      if (messages && messages.length > 0) fields[field] = messages
    }
    throw new InvalidConfigurationError(fields)
  }
  return result.data
}

/**
 * Validate, floor the population to the minimum swarm size, and replace a
 * zero seed with a clock-derived one.
 */
export function resolveConfig(config: PSOConfig): ResolvedConfig {
  const valid = validateConfig(config)
  return {
    ...valid,
    population: Math.max(MIN_POPULATION, valid.population),
    seed: valid.seed === 0 ? deriveTimeSeed() : valid.seed,
  }
}
