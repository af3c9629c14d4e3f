import type { Options } from 'yargs'

export type GlobalArgs = {
  config?: string
  logLevel: string
}

export const globalOptions: Record<keyof GlobalArgs, Options> = {
  config: {
    description: 'JSON file with node settings; flags override its values',
    type: 'string',
  },
  logLevel: {
    description: 'Logging verbosity level',
    type: 'string',
    choices: ['error', 'warn', 'info', 'debug'],
    default: 'info',
  },
}
