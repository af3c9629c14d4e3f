#!/usr/bin/env -S npx tsx

import { getCli } from './cli'

const cli = getCli()

cli
  .fail((msg, err) => {
    if (msg?.includes('Not enough non-option arguments')) {
      cli.showHelp()
      console.log('\n')
    }

    const errorMessage = err !== undefined ? (err.stack ?? err.message) : msg || 'Unknown error'

    console.error(` ✖ ${errorMessage}\n`)
    process.exit(1)
  })
  .parseAsync()
  .catch((err: unknown) => {
    console.error(` ✖ ${err instanceof Error ? err.message : String(err)}\n`)
    process.exit(1)
  })
