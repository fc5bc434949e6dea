#!/usr/bin/env -S node --enable-source-maps

import { hideBin } from 'yargs/helpers'

import { FATAL_EXIT_CODE, main } from './harness-cli'

main(hideBin(process.argv), { cwd: process.cwd() }).then(
  exitCode => {
    process.exitCode = exitCode
  },
  (e: unknown) => {
    console.error(e) // eslint-disable-line no-console
    process.exitCode = FATAL_EXIT_CODE
  },
)
