// ---------------------------------------------------------------------------
// Scalar Kalman filter, AR(1) measurement error
// ---------------------------------------------------------------------------
// Measurement error e(t) = a·e(t−1) + w(t), Var w = V = R·(1 − a²), so the
// stationary variance of e is R. Per observation y(t), t ≥ 1:
//   P ← P + Q
//   K ← (P + Q) / (P + Q + V)
//   x ← x + K·(y(t) − x)
//   P ← P + Q − K·(P + V)
// Seed: x = x0 ?? y(0), P = R.
//
// The extra Q in gain and posterior is part of the correlated-error model.
// With a = 0 this is NOT the independent filter.

import type { FilterTrace, ScalarEstimate, ScalarUpdateRule } from '../types.js';
import { parseAR1Params, parseObservations, type AR1ParamsInput } from './schemas.js';
import { deriveNoiseVariances, runFilter, runFilterTrace, seedEstimate } from './scalar-step.js';

/** Gain and posterior for AR1 measurement noise with innovation variance V. */
export function ar1UpdateRule(Q: number, V: number): ScalarUpdateRule {
  return {
    gain: (P) => (P + Q) / (P + Q + V),
    posterior: (P, K) => P + Q - K * (P + V),
  };
}

function prepare(ys: readonly number[], params: AR1ParamsInput) {
  const observations = parseObservations(ys);
  const { sigmaHat, rHat, a, x0 } = parseAR1Params(params);
  const { Q, R, V } = deriveNoiseVariances({ sigmaHat, rHat, a });
  return {
    observations,
    seed: seedEstimate(observations, R, x0),
    Q,
    rule: ar1UpdateRule(Q, V),
  };
}

/**
 * Final posterior (x, P) under AR1 measurement error.
 *
 * @throws InvalidInputError on an empty or non-finite series
 * @throws InvalidParameterError on non-positive sigmaHat/rHat or |a| ≥ 1
 */
export function filterAR1(ys: readonly number[], params: AR1ParamsInput = {}): ScalarEstimate {
  const { observations, seed, Q, rule } = prepare(ys, params);
  return runFilter(observations, seed, Q, rule);
}

/** Priors under AR1 measurement error, same layout as traceIndependent. */
export function traceAR1(ys: readonly number[], params: AR1ParamsInput = {}): FilterTrace {
  const { observations, seed, Q, rule } = prepare(ys, params);
  return runFilterTrace(observations, seed, Q, rule);
}
