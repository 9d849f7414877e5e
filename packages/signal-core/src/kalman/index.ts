// Scalar Kalman filtering
export { filterIndependent, traceIndependent, independentUpdateRule } from './independent.js';

export { filterAR1, traceAR1, ar1UpdateRule } from './ar1.js';

export {
  scalarStep,
  runFilter,
  runFilterTrace,
  seedEstimate,
  deriveNoiseVariances,
  standardDeviation,
} from './scalar-step.js';

export {
  observationsSchema,
  independentParamsSchema,
  ar1ParamsSchema,
  parseObservations,
  parseIndependentParams,
  parseAR1Params,
  type IndependentParams,
  type IndependentParamsInput,
  type AR1Params,
  type AR1ParamsInput,
} from './schemas.js';
