/**
 * Environment overrides for the noise defaults and log level.
 *
 * Unset or empty variables fall back to the defaults. A set variable that
 * does not parse as a finite number throws immediately with its name.
 */

import { DEFAULT_NOISE_PARAMS, type NoiseParams } from './defaults.js'

export type EnvRecord = Record<string, string | undefined>

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export const DEFAULT_LOG_LEVEL: LogLevel = 'info'

/** An environment variable is set to a value that cannot be used. */
export class ConfigError extends Error {
  constructor(
    public readonly key: string,
    public readonly value: string,
  ) {
    super(`Invalid numeric environment variable: ${key}=${value}`)
    this.name = 'ConfigError'
  }
}

function readEnvNumber(env: EnvRecord, key: string): number | undefined {
  const val = env[key]
  if (val === undefined || val.trim() === '') return undefined
  const parsed = Number(val)
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(key, val)
  }
  return parsed
}

/** Resolve noise scales: env override > default. Range checks happen in the filters. */
export function resolveNoiseParams(env: EnvRecord = process.env): NoiseParams {
  return {
    sigmaHat: readEnvNumber(env, 'KALMAN_SIGMA_HAT') ?? DEFAULT_NOISE_PARAMS.sigmaHat,
    rHat: readEnvNumber(env, 'KALMAN_R_HAT') ?? DEFAULT_NOISE_PARAMS.rHat,
    a: readEnvNumber(env, 'KALMAN_AR1_COEFFICIENT') ?? DEFAULT_NOISE_PARAMS.a,
  }
}

/** Resolve LOG_LEVEL; unknown values fall back to the default. */
export function resolveLogLevel(env: EnvRecord = process.env): LogLevel {
  const val = env.LOG_LEVEL?.trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === val) ?? DEFAULT_LOG_LEVEL
}
