import type { CommandModule } from 'yargs'
import { nodeHandler } from './handler'
import { nodeArgsSchema, nodeOptions } from './options'

export const nodeCommand: CommandModule = {
  command: 'node',
  describe: 'Run a peer-to-peer node',
  builder: nodeOptions,
  handler: async (args) => {
    await nodeHandler(nodeArgsSchema.parse(args))
  },
}
