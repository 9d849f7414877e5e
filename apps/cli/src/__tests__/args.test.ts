import { describe, it, expect } from 'vitest'
import { parseCliArgs, UsageError } from '../args.js'

describe('parseCliArgs', () => {
  it('defaults to the AR1 model without trace', () => {
    expect(parseCliArgs([])).toEqual({ model: 'ar1', trace: false, values: [] })
  })

  it('reads flags and observations', () => {
    expect(parseCliArgs(['--model', 'independent', '--sigma', '0.5', '--trace', '1', '-2', '3'])).toEqual({
      model: 'independent',
      sigmaHat: 0.5,
      trace: true,
      values: [1, -2, 3],
    })
  })

  it('reads noise overrides and x0', () => {
    const options = parseCliArgs(['--r', '2', '--a', '-0.3', '--x0', '100'])
    expect(options.rHat).toBe(2)
    expect(options.a).toBe(-0.3)
    expect(options.x0).toBe(100)
  })

  it('treats everything after -- as observations', () => {
    expect(parseCliArgs(['--', '4', '5']).values).toEqual([4, 5])
  })

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow(new UsageError('Unknown option: --bogus'))
  })

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['--sigma'])).toThrow('Missing value for --sigma')
  })

  it('rejects non-numeric values', () => {
    expect(() => parseCliArgs(['--sigma', 'abc'])).toThrow('--sigma must be a number')
    expect(() => parseCliArgs(['1', 'two'])).toThrow('value must be a number')
  })

  it('rejects blank values instead of reading them as zero', () => {
    expect(() => parseCliArgs(['1', ''])).toThrow('value must be a number')
    expect(() => parseCliArgs(['--sigma', '  '])).toThrow('--sigma must be a number')
  })

  it('rejects unknown models', () => {
    expect(() => parseCliArgs(['--model', 'kalman'])).toThrow(UsageError)
  })
})
