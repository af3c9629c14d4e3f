import type { CommandModule } from 'yargs'
import { nodeCommand } from './node/index'

export const commands: CommandModule[] = [nodeCommand]
