import { z } from 'zod'

export const USAGE =
  'Usage: serial-kalman [--model independent|ar1] [--sigma N] [--r N] [--a N] [--x0 N] [--trace] [values...]'

/** Bad command-line input. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

const numberArg = (name: string) =>
  z
    .string()
    .trim()
    .min(1, `${name} must be a number`)
    .pipe(z.coerce.number({ invalid_type_error: `${name} must be a number` }).finite(`${name} must be finite`))

export const cliOptionsSchema = z.object({
  model: z.enum(['independent', 'ar1']).default('ar1'),
  sigmaHat: numberArg('--sigma').optional(),
  rHat: numberArg('--r').optional(),
  a: numberArg('--a').optional(),
  x0: numberArg('--x0').optional(),
  trace: z.boolean().default(false),
  values: z.array(numberArg('value')),
})

export type CliOptions = z.output<typeof cliOptionsSchema>

const VALUE_FLAGS: Record<string, 'model' | 'sigmaHat' | 'rHat' | 'a' | 'x0'> = {
  '--model': 'model',
  '--sigma': 'sigmaHat',
  '--r': 'rHat',
  '--a': 'a',
  '--x0': 'x0',
}

/**
 * Parse argv (without node and script). Flags take the next argument as
 * their value; anything else not starting with `--` is an observation.
 * Everything after a bare `--` is an observation.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: Record<string, unknown> = {}
  const values: string[] = []
  let positionalOnly = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === undefined) continue
    if (positionalOnly || !arg.startsWith('--')) {
      values.push(arg)
    } else if (arg === '--') {
      positionalOnly = true
    } else if (arg === '--trace') {
      raw.trace = true
    } else {
      const key = VALUE_FLAGS[arg]
      if (key === undefined) throw new UsageError(`Unknown option: ${arg}`)
      const value = argv[i + 1]
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`)
      raw[key] = value
      i++
    }
  }

  const result = cliOptionsSchema.safeParse({ ...raw, values })
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '))
  }
  return result.data
}
