/** Noise scales shared by both filters. `a` is only read by the AR1 filter. */
export interface NoiseParams {
  sigmaHat: number
  rHat: number
  a: number
}

/** Default noise scales. */
export const DEFAULT_NOISE_PARAMS: Readonly<NoiseParams> = {
  sigmaHat: 1.0,
  rHat: 1.0,
  a: 0.25,
}

/** Example series the demonstration runs on when given no values. */
export const DEMO_SERIES: readonly number[] = [100, 100.12, 100.45, 99.34, 99.66, 99.8]
