// Shared configuration: noise defaults, demo series, environment overrides.

export {
  DEFAULT_NOISE_PARAMS,
  DEMO_SERIES,
  type NoiseParams,
} from './defaults.js'

export {
  resolveNoiseParams,
  resolveLogLevel,
  ConfigError,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  type EnvRecord,
  type LogLevel,
} from './env.js'
