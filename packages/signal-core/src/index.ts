// ---------------------------------------------------------------------------
// @serial-kalman/signal-core — Barrel Export
// ---------------------------------------------------------------------------
// One-dimensional Kalman filters over a scalar series, with independent or
// AR(1) measurement error.

export type {
  ScalarEstimate,
  Observations,
  NoiseVariances,
  ScalarUpdateRule,
  ScalarStepResult,
  FilterTrace,
} from './types.js';

export {
  KalmanError,
  InvalidInputError,
  InvalidParameterError,
  NumericDegeneracyError,
  type KalmanErrorCode,
} from './errors.js';

export * from './kalman/index.js';

