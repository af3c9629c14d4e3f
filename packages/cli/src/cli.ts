import yargs, { type Argv } from 'yargs'
import { hideBin } from 'yargs/helpers'
import { commands } from './cmds/index'
import { globalOptions } from './options/globalOptions'

const VERSION = '0.1.0'
const topBanner = `meshwork: peer-to-peer networking node
  * Version: ${VERSION}`

const bottomBanner = `Settings can also come from MESHWORK_* environment variables,
e.g. MESHWORK_OUTBOUND_CONNECTIONS=4`

export function getCli(argv: string[] = hideBin(process.argv)): Argv {
  const cli = yargs(argv)

  // Register all commands
  for (const cmd of commands) {
    cli.command(cmd)
  }

  return cli
    .env('MESHWORK')
    .parserConfiguration({
      'dot-notation': false,
    })
    .options(globalOptions)
    .scriptName('meshwork')
    .demandCommand(1)
    .showHelpOnFail(false)
    .usage(topBanner)
    .epilogue(bottomBanner)
    .version(VERSION)
    .alias('h', 'help')
    .alias('v', 'version')
    .recommendCommands()
    .strict()
}

export { mergeSettings, readConfigFile } from './cmds/node/config'
export { nodeHandler } from './cmds/node/handler'
export { type NodeArgs, nodeArgsSchema, nodeOptions } from './cmds/node/options'
export { type GlobalArgs, globalOptions } from './options/globalOptions'
