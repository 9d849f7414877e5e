// ---------------------------------------------------------------------------
// Scalar predict/update step
// ---------------------------------------------------------------------------
// Predict:   P ← P + Q          (state transition is the identity)
// Gain:      K ← rule.gain(P)
// Update:    x ← x + K·(y − x)
// Posterior: P ← rule.posterior(P, K)

import { NumericDegeneracyError } from '../errors.js';
import type {
  FilterTrace,
  NoiseVariances,
  Observations,
  ScalarEstimate,
  ScalarStepResult,
  ScalarUpdateRule,
} from '../types.js';

/**
 * Round-off allowance, in units of Number.EPSILON·(P + Q), below which a
 * negative posterior variance is taken as zero.
 */
const ROUNDING_ULPS = 8;

/**
 * Q = sigmaHat², R = rHat², V = R·(1 − a²).
 * Throws a step-0 NumericDegeneracyError when squaring under- or overflows.
 */
export function deriveNoiseVariances(params: { sigmaHat: number; rHat: number; a?: number }): NoiseVariances {
  const Q = params.sigmaHat ** 2;
  const R = params.rHat ** 2;
  const a = params.a ?? 0;
  const V = R * (1 - a * a);
  for (const value of [Q, R, V]) {
    if (!Number.isFinite(value) || value <= 0) throw new NumericDegeneracyError(0, 'variance', value);
  }
  return { Q, R, V };
}

/** Implied standard deviation of an estimate, sqrt(P). */
export function standardDeviation(estimate: ScalarEstimate): number {
  return Math.sqrt(estimate.P);
}

/** Seed state: x0 when given, else the first observation; P = R. */
export function seedEstimate(ys: Observations, R: number, x0?: number): ScalarEstimate {
  return { x: x0 ?? ys[0], P: R };
}

/**
 * One filter step. `step` is the index of y in the series and is only used
 * to label a NumericDegeneracyError.
 */
export function scalarStep(
  state: ScalarEstimate,
  y: number,
  Q: number,
  rule: ScalarUpdateRule,
  step: number,
): ScalarStepResult {
  const P = state.P + Q;
  const prior = { x: state.x, P };

  const K = rule.gain(P);
  if (!Number.isFinite(K)) throw new NumericDegeneracyError(step, 'gain', K);

  const x = state.x + K * (y - state.x);
  const PPost = rule.posterior(P, K);
  if (!Number.isFinite(PPost) || PPost < -ROUNDING_ULPS * Number.EPSILON * (P + Q)) {
    throw new NumericDegeneracyError(step, 'variance', PPost);
  }

  return { prior, posterior: { x, P: Math.max(PPost, 0) }, gain: K };
}

/** Fold every observation after the seed through the rule. */
export function runFilter(
  ys: Observations,
  seed: ScalarEstimate,
  Q: number,
  rule: ScalarUpdateRule,
): ScalarEstimate {
  let state = seed;
  for (const [i, y] of ys.slice(1).entries()) {
    state = scalarStep(state, y, Q, rule, i + 1).posterior;
  }
  return state;
}

/** Like runFilter, but records the prior made before each observation. */
export function runFilterTrace(
  ys: Observations,
  seed: ScalarEstimate,
  Q: number,
  rule: ScalarUpdateRule,
): FilterTrace {
  const xs: Array<number | undefined> = [undefined];
  const Ps: Array<number | undefined> = [undefined];

  let state = seed;
  for (const [i, y] of ys.slice(1).entries()) {
    const { prior, posterior } = scalarStep(state, y, Q, rule, i + 1);
    xs.push(prior.x);
    Ps.push(prior.P);
    state = posterior;
  }

  return { xs, Ps, final: state };
}
