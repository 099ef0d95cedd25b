/**
 * Error types for question generation
 */

/**
 * A generation request failed for one unit of one tier.
 * The orchestrators catch it and substitute placeholder questions.
 */
export class GenerationError extends Error {
  readonly unitName: string;
  readonly tier: string;

  constructor(tier: string, unitName: string, cause: unknown) {
    super(`Error generating ${tier} questions for ${unitName}: ${describeError(cause)}`, { cause });
    this.name = 'GenerationError';
    this.tier = tier;
    this.unitName = unitName;
  }
}

/**
 * Settings are missing or out of range
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
