// ---------------------------------------------------------------------------
// @serial-kalman/signal-core — Scalar Filter Types
// ---------------------------------------------------------------------------

/** Filter state: estimate x and its variance P. */
export interface ScalarEstimate {
  x: number;
  P: number;
}

/** Ordered, non-empty observation series. */
export type Observations = readonly [number, ...number[]];

/** Variances derived from the noise scales. */
export interface NoiseVariances {
  /** Diffusion variance sigmaHat² */
  Q: number;
  /** Measurement variance rHat² */
  R: number;
  /** AR1 innovation variance R·(1 − a²); equals R when no AR1 term is given */
  V: number;
}

/**
 * Model-specific half of a filter step. Both functions receive the
 * predicted variance, i.e. P after the diffusion term was added.
 */
export interface ScalarUpdateRule {
  gain(P: number): number;
  posterior(P: number, K: number): number;
}

/** Result of a single predict/update step. */
export interface ScalarStepResult {
  /** One-step-ahead prediction made before the observation. */
  prior: ScalarEstimate;
  posterior: ScalarEstimate;
  gain: number;
}

/**
 * Per-step priors. Slot 0 is always undefined: nothing is predicted before
 * the first observation seeds the filter.
 */
export interface FilterTrace {
  xs: Array<number | undefined>;
  Ps: Array<number | undefined>;
  /** Posterior after the last observation (same as terminal mode). */
  final: ScalarEstimate;
}
