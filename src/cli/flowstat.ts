#!/usr/bin/env node

import { run, EXIT_FAILURE } from './run'

// Only run if this is the main module
if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(error)
      process.exitCode = EXIT_FAILURE
    }
  )
}
