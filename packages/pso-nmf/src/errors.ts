/** Input matrices are not rank-2, are ragged or empty, or disagree on row count. */
export class ShapeMismatchError extends Error {
  constructor(
    public readonly label: string,
    public readonly detail: string,
  ) {
    super(`Shape mismatch in ${label}: ${detail}`)
    this.name = 'ShapeMismatchError'
  }
}

/** Solver parameters that cannot be run. Population below 2 is floored, not rejected. */
export class InvalidConfigurationError extends Error {
  constructor(public readonly fields: Record<string, string[]>) {
    const summary = Object.entries(fields)
      .map(([field, messages]) => `${field}: ${messages.join(', ')}`)
      .join('; ')
    super(`Invalid solver configuration (${summary})`)
    this.name = 'InvalidConfigurationError'
  }
}

/** Non-finite values in the inputs, or a search that never produced a finite cost. */
export class NumericInstabilityError extends Error {
  constructor(
    public readonly label: string,
    detail: string,
  ) {
    super(`Numeric instability in ${label}: ${detail}`)
    this.name = 'NumericInstabilityError'
  }
}
