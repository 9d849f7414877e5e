// ---------------------------------------------------------------------------
// Entry validation for the scalar filters
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { DEFAULT_NOISE_PARAMS } from '@serial-kalman/config';
import { InvalidInputError, InvalidParameterError } from '../errors.js';
import type { Observations } from '../types.js';

export const observationsSchema = z
  .array(z.number().finite('Observations must be finite numbers'), {
    invalid_type_error: 'Observations must be an array of numbers',
  })
  .nonempty('At least one observation is required');

export const independentParamsSchema = z.object({
  sigmaHat: z.number().finite().positive('sigmaHat must be positive').default(DEFAULT_NOISE_PARAMS.sigmaHat),
  rHat: z.number().finite().positive('rHat must be positive').default(DEFAULT_NOISE_PARAMS.rHat),
  /** Initial state; falls back to the first observation. */
  x0: z.number().finite().optional(),
});

export const ar1ParamsSchema = independentParamsSchema.extend({
  a: z
    .number()
    .gt(-1, 'a must lie strictly between -1 and 1')
    .lt(1, 'a must lie strictly between -1 and 1')
    .default(DEFAULT_NOISE_PARAMS.a),
});

export type IndependentParamsInput = z.input<typeof independentParamsSchema>;
export type IndependentParams = z.output<typeof independentParamsSchema>;
export type AR1ParamsInput = z.input<typeof ar1ParamsSchema>;
export type AR1Params = z.output<typeof ar1ParamsSchema>;

/** Validate the observation series. Returns a copy; the caller's array is never touched. */
export function parseObservations(ys: unknown): Observations {
  const result = observationsSchema.safeParse(ys);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidInputError(message);
  }
  return result.data;
}

function toParameterError(error: z.ZodError): InvalidParameterError {
  const fieldErrors = error.flatten().fieldErrors;
  const fields = Object.keys(fieldErrors);
  const message = Object.entries(fieldErrors)
    .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
    .join('; ');
  return new InvalidParameterError(fields, message || 'Invalid filter parameters');
}

export function parseIndependentParams(params: unknown): IndependentParams {
  const result = independentParamsSchema.safeParse(params);
  if (!result.success) throw toParameterError(result.error);
  return result.data;
}

export function parseAR1Params(params: unknown): AR1Params {
  const result = ar1ParamsSchema.safeParse(params);
  if (!result.success) throw toParameterError(result.error);
  return result.data;
}
