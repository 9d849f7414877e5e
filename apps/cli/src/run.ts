import { ConfigError, DEMO_SERIES, resolveNoiseParams, type EnvRecord } from '@serial-kalman/config'
import {
  KalmanError,
  filterAR1,
  filterIndependent,
  standardDeviation,
  traceAR1,
  traceIndependent,
  type ScalarEstimate,
} from '@serial-kalman/signal-core'
import { parseCliArgs, UsageError, USAGE, type CliOptions } from './args.js'
import type { Logger } from './lib/logger.js'

export interface CliIO {
  /** Writes one line of program output. */
  out: (line: string) => void
  logger: Logger
}

function formatEstimate(estimate: ScalarEstimate): string[] {
  return [`estimate: ${estimate.x.toFixed(2)}`, `std: ${standardDeviation(estimate).toFixed(3)}`]
}

function filterSeries(options: CliOptions, env: EnvRecord, io: CliIO): void {
  const defaults = resolveNoiseParams(env)
  const ys = options.values.length > 0 ? options.values : DEMO_SERIES
  const params = {
    sigmaHat: options.sigmaHat ?? defaults.sigmaHat,
    rHat: options.rHat ?? defaults.rHat,
    x0: options.x0,
  }
  const ar1Params = { ...params, a: options.a ?? defaults.a }

  io.logger.debug('filter parameters', { model: options.model, ...ar1Params, n: ys.length })

  if (options.trace) {
    const trace = options.model === 'ar1' ? traceAR1(ys, ar1Params) : traceIndependent(ys, params)
    for (let t = 1; t < ys.length; t++) {
      io.out(`step ${t}: x=${(trace.xs[t] ?? NaN).toFixed(2)} P=${(trace.Ps[t] ?? NaN).toFixed(3)}`)
    }
    formatEstimate(trace.final).forEach((line) => io.out(line))
  } else {
    const estimate = options.model === 'ar1' ? filterAR1(ys, ar1Params) : filterIndependent(ys, params)
    formatEstimate(estimate).forEach((line) => io.out(line))
  }

  io.logger.info('filtered series', { model: options.model, n: ys.length })
}

/**
 * Run the demonstration. Returns the process exit code: 0 on success,
 * 1 on bad arguments, configuration or filter input. Other errors propagate.
 */
export function run(argv: readonly string[], env: EnvRecord, io: CliIO): number {
  try {
    filterSeries(parseCliArgs(argv), env, io)
    return 0
  } catch (err) {
    if (err instanceof UsageError) {
      io.logger.error(err.message, { usage: USAGE })
      return 1
    }
    if (err instanceof KalmanError) {
      io.logger.error(err.message, { code: err.code, error: err.name })
      return 1
    }
    if (err instanceof ConfigError) {
      io.logger.error(err.message, { error: err.name, key: err.key })
      return 1
    }
    throw err
  }
}
