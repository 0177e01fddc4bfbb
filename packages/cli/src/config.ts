/**
 * Demo configuration, read from environment variables.
 */

/**
 * Settings for the demo scenarios.
 */
export interface DemoConfig {
  /**
   * How long each producer works before writing, in milliseconds.
   */
  delayMs: number

  /**
   * Number of independent handoffs in the batch scenario.
   */
  consumers: number

  /**
   * Number of producers the batch scenario runs at once.
   */
  workers: number
}

export const DEFAULT_CONFIG: DemoConfig = {
  delayMs: 2000,
  consumers: 4,
  workers: 2,
}

/**
 * Error thrown when an environment variable holds an unusable value.
 */
export class InvalidConfigError extends Error {
  constructor(name: string, value: string, minimum: number) {
    super(`${name} must be an integer of at least ${minimum}, got '${value}'`)
    this.name = `InvalidConfigError`
  }
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  minimum: number
): number {
  const raw = env[name]
  if (raw === undefined || raw === ``) return fallback

  const value = Number(raw)
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidConfigError(name, raw, minimum)
  }
  return value
}

/**
 * Load the demo configuration.
 *
 * @throws {InvalidConfigError} if a variable is not an integer in range
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  return {
    delayMs: readInteger(env, `HANDOFF_DELAY_MS`, DEFAULT_CONFIG.delayMs, 0),
    consumers: readInteger(
      env,
      `HANDOFF_CONSUMERS`,
      DEFAULT_CONFIG.consumers,
      1
    ),
    workers: readInteger(env, `HANDOFF_WORKERS`, DEFAULT_CONFIG.workers, 1),
  }
}
