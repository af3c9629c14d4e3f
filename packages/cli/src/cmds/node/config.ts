import { ConfigError, ErrorCode, type SettingsInput, settingsSchema } from '@meshwork/p2p'
import { readFile } from 'node:fs/promises'
import { shake } from 'radash'
import type { NodeArgs } from './options'

const fileSchema = settingsSchema.partial()

/**
 * Reads node settings from a JSON file. Keys are the settings names;
 * defaults are left to `createSettings`.
 */
export async function readConfigFile(path: string): Promise<SettingsInput> {
  let json: unknown
  try {
    json = JSON.parse(await readFile(path, 'utf8'))
  } catch (err) {
    throw new ConfigError(`cannot read config ${path}`, {
      code: ErrorCode.INVALID_SETTINGS,
      context: { path },
      cause: err,
    })
  }

  const parsed = fileSchema.safeParse(json)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`invalid config ${path}: ${detail}`, {
      code: ErrorCode.INVALID_SETTINGS,
      context: { path },
    })
  }
  return parsed.data
}

/** Overlays the flags that were set on the file settings */
export function mergeSettings(file: SettingsInput, args: NodeArgs): SettingsInput {
  const flags: SettingsInput = {
    nodeId: args.nodeId,
    inbound: args.inbound,
    externalAddrs: args.externalAddrs,
    peers: args.peers,
    seeds: args.seeds,
    allowedTransports: args.allowedTransports,
    transportMixing: args.transportMixing,
    torSocksProxy: args.torSocksProxy,
    localnet: args.localnet,
    outboundConnections: args.outboundConnections,
    inboundConnections: args.inboundConnections,
    hostlist: args.hostlist,
  }
  return { ...file, ...shake(flags) }
}
