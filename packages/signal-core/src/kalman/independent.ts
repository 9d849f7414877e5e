// ---------------------------------------------------------------------------
// Scalar Kalman filter, independent measurement error
// ---------------------------------------------------------------------------
// Per observation y(t), t ≥ 1:
//   P ← P + Q
//   K ← P / (P + R)
//   x ← x + K·(y(t) − x)
//   P ← P·(1 − K)
// Seed: x = x0 ?? y(0), P = R.

import type { FilterTrace, ScalarEstimate, ScalarUpdateRule } from '../types.js';
import { parseIndependentParams, parseObservations, type IndependentParamsInput } from './schemas.js';
import { deriveNoiseVariances, runFilter, runFilterTrace, seedEstimate } from './scalar-step.js';

/**
 * Gain and posterior for i.i.d. measurement noise of variance R.
 * R = 0 with P = 0 divides by zero; the step reports that as a degeneracy.
 */
export function independentUpdateRule(R: number): ScalarUpdateRule {
  return {
    gain: (P) => P / (P + R),
    posterior: (P, K) => P * (1 - K),
  };
}

function prepare(ys: readonly number[], params: IndependentParamsInput) {
  const observations = parseObservations(ys);
  const { sigmaHat, rHat, x0 } = parseIndependentParams(params);
  const { Q, R } = deriveNoiseVariances({ sigmaHat, rHat });
  return {
    observations,
    seed: seedEstimate(observations, R, x0),
    Q,
    rule: independentUpdateRule(R),
  };
}

/**
 * Final posterior (x, P) after filtering the whole series.
 *
 * @throws InvalidInputError on an empty or non-finite series
 * @throws InvalidParameterError on non-positive sigmaHat/rHat
 */
export function filterIndependent(ys: readonly number[], params: IndependentParamsInput = {}): ScalarEstimate {
  const { observations, seed, Q, rule } = prepare(ys, params);
  return runFilter(observations, seed, Q, rule);
}

/**
 * Priors xs[t], Ps[t] made before y(t) is seen; slot 0 is undefined.
 * A single observation yields `{ xs: [undefined], Ps: [undefined] }`.
 */
export function traceIndependent(ys: readonly number[], params: IndependentParamsInput = {}): FilterTrace {
  const { observations, seed, Q, rule } = prepare(ys, params);
  return runFilterTrace(observations, seed, Q, rule);
}
