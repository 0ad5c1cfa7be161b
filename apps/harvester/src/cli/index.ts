#!/usr/bin/env node
import '../env.js'

import { loadHarvesterConfig } from '../config/settings.js'
import { ConfigError, errorMessage } from '../errors.js'
import { runCli } from './main.js'
import { CliRuntime } from './runtime.js'

runCli(process.argv.slice(2), () => new CliRuntime(loadHarvesterConfig()))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error))
    process.exitCode = error instanceof ConfigError ? 2 : 1
  })
