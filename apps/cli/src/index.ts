#!/usr/bin/env node
import { resolveLogLevel } from '@serial-kalman/config'
import { createLogger } from './lib/logger.js'
import { run } from './run.js'

process.exitCode = run(process.argv.slice(2), process.env, {
  out: (line) => {
    process.stdout.write(line + '\n')
  },
  logger: createLogger(resolveLogLevel(process.env)),
})
