#!/usr/bin/env tsx
import 'dotenv/config'
import { runCli } from './cli/run-cli.ts'

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode
  })
  .catch((error) => {
    console.error('Fatal error:', error)
    process.exit(1)
  })
