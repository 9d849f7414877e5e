// ---------------------------------------------------------------------------
// @serial-kalman/signal-core — Errors
// ---------------------------------------------------------------------------

export type KalmanErrorCode = 'INVALID_INPUT' | 'INVALID_PARAMETER' | 'NUMERIC_DEGENERACY';

/** Base class for every failure raised by the filters. */
export class KalmanError extends Error {
  constructor(
    public readonly code: KalmanErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'KalmanError';
  }
}

/** Observation series is empty or holds non-finite values. */
export class InvalidInputError extends KalmanError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

/** A noise scale, AR1 coefficient or initial state is out of range. */
export class InvalidParameterError extends KalmanError {
  constructor(
    public readonly fields: string[],
    message: string,
  ) {
    super('INVALID_PARAMETER', message);
    this.name = 'InvalidParameterError';
  }
}

/** Gain or variance left the finite, non-negative range mid-recursion. */
export class NumericDegeneracyError extends KalmanError {
  constructor(
    public readonly step: number,
    public readonly quantity: 'gain' | 'variance',
    public readonly value: number,
  ) {
    super('NUMERIC_DEGENERACY', `Degenerate ${quantity} ${value} at step ${step}`);
    this.name = 'NumericDegeneracyError';
  }
}
