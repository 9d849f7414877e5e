import { describe, it, expect } from 'vitest'
import { resolveNoiseParams, resolveLogLevel, ConfigError, DEFAULT_NOISE_PARAMS } from '../index.js'

describe('resolveNoiseParams', () => {
  it('returns defaults for an empty environment', () => {
    expect(resolveNoiseParams({})).toEqual({ sigmaHat: 1, rHat: 1, a: 0.25 })
  })

  it('applies env overrides', () => {
    const params = resolveNoiseParams({
      KALMAN_SIGMA_HAT: '0.5',
      KALMAN_R_HAT: '2',
      KALMAN_AR1_COEFFICIENT: '-0.1',
    })
    expect(params).toEqual({ sigmaHat: 0.5, rHat: 2, a: -0.1 })
  })

  it('treats empty strings as unset', () => {
    expect(resolveNoiseParams({ KALMAN_R_HAT: '  ' }).rHat).toBe(DEFAULT_NOISE_PARAMS.rHat)
  })

  it('throws with the variable name on unparsable values', () => {
    expect(() => resolveNoiseParams({ KALMAN_SIGMA_HAT: 'abc' })).toThrow(
      'Invalid numeric environment variable: KALMAN_SIGMA_HAT=abc',
    )
    expect(() => resolveNoiseParams({ KALMAN_R_HAT: 'NaN' })).toThrow(ConfigError)
  })

  it('does not range-check values', () => {
    expect(resolveNoiseParams({ KALMAN_AR1_COEFFICIENT: '1.5' }).a).toBe(1.5)
  })
})

describe('resolveLogLevel', () => {
  it('defaults to info', () => {
    expect(resolveLogLevel({})).toBe('info')
  })

  it('accepts known levels case-insensitively', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'DEBUG' })).toBe('debug')
    expect(resolveLogLevel({ LOG_LEVEL: 'warn' })).toBe('warn')
  })

  it('falls back to info for unknown levels', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose' })).toBe('info')
  })
})
