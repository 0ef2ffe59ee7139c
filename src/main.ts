#!/usr/bin/env node
import { hideBin } from 'yargs/helpers'
import { runCli } from './interfaces/cli/run.js'
import { createProcessIO } from './interfaces/cli/io.js'

runCli({ argv: hideBin(process.argv), io: createProcessIO() })
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err)
    process.exitCode = 1
  })
