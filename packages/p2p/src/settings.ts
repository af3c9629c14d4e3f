import { z } from 'zod'
import {
  type Address,
  isTransportScheme,
  normalizeAddress,
} from './address'
import { ConfigError, ErrorCode } from './errors'

/** Protocol version advertised in the version handshake. Peers must share the major. */
export const PROTOCOL_VERSION = '0.1.0'

const blacklistEntrySchema = z.object({
  host: z.string().min(1),
  /** Schemes the rule applies to, empty for all */
  transports: z.array(z.string()).default([]),
  /** Ports the rule applies to, empty for all */
  ports: z.array(z.number().int().min(0).max(65535)).default([]),
})

const duration = z.number().int().nonnegative()

export const settingsSchema = z
  .object({
    /** Identity string sent in the version handshake */
    nodeId: z.string().default(''),
    /** Addresses to accept inbound connections on */
    inbound: z.array(z.string()).default([]),
    /** Addresses advertised to peers as reachable */
    externalAddrs: z.array(z.string()).default([]),
    /** Peers kept connected by the manual session */
    peers: z.array(z.string()).default([]),
    /** Nodes queried for addresses at startup */
    seeds: z.array(z.string()).default([]),
    /** Application version sent alongside the protocol version */
    appVersion: z.string().default('0.1.0'),
    /** Schemes this node may dial and listen on */
    allowedTransports: z.array(z.string()).min(1).default(['tcp+tls']),
    /** Allow tcp peers over tor, and tcp+tls peers over tor+tls */
    transportMixing: z.boolean().default(true),
    /** Number of outbound slots */
    outboundConnections: z.number().int().nonnegative().default(8),
    /** Maximum number of concurrent inbound channels */
    inboundConnections: z.number().int().nonnegative().default(8),
    /** Dial timeout, also the manual reconnect delay */
    outboundConnectTimeout: duration.default(15_000),
    /** Time allowed for the version exchange */
    channelHandshakeTimeout: duration.default(10_000),
    /** Interval between pings on a live channel */
    channelHeartbeatInterval: duration.default(30_000),
    /** Allow local and private addresses in the host store */
    localnet: z.boolean().default(false),
    /** Minimum time between two peer discovery rounds */
    outboundPeerDiscoveryCooloffTime: duration.default(30_000),
    /** Sleep after a slot found no candidate */
    outboundPeerDiscoveryAttemptTime: duration.default(5_000),
    /** Host store file, empty to keep hosts in memory only */
    hostlist: z.string().default(''),
    /** Sleep between greylist probes */
    greylistRefineryInterval: duration.default(15_000),
    /** Percentage of non-gold slots that draw from the whitelist */
    whiteConnectPercent: z.number().int().min(0).max(100).default(70),
    /** Number of slots that prefer anchor and gold peers */
    goldConnectCount: z.number().int().nonnegative().default(2),
    /** Wait for the preferred tier instead of falling back */
    slotPreferenceStrict: z.boolean().default(false),
    /** Pause refinery probes after this long without a connected channel */
    timeWithNoConnections: duration.default(30_000),
    /** Host, transport and port rules that are never dialed or accepted */
    blacklist: z.array(blacklistEntrySchema).default([]),
    /** `strict` bans misbehaving peers, `relaxed` only logs */
    banPolicy: z.enum(['strict', 'relaxed']).default('strict'),
    /** SOCKS5 proxy used by the tor transports */
    torSocksProxy: z.string().default('socks5://127.0.0.1:9050'),
    /** Consecutive failed attempts per manual peer, 0 for unlimited */
    manualAttemptLimit: z.number().int().nonnegative().default(0),
  })
  .strict()

export type SettingsInput = z.input<typeof settingsSchema>
export type BlacklistEntry = z.output<typeof blacklistEntrySchema>
export type BanPolicy = z.output<typeof settingsSchema>['banPolicy']

export type Settings = Readonly<
  Omit<z.output<typeof settingsSchema>, 'inbound' | 'externalAddrs' | 'peers' | 'seeds'> & {
    inbound: readonly Address[]
    externalAddrs: readonly Address[]
    peers: readonly Address[]
    seeds: readonly Address[]
  }
>

/**
 * Validates and normalizes settings, filling in defaults. Throws
 * `ConfigError` on anything a session could not act on.
 */
export function createSettings(input: SettingsInput = {}): Settings {
  const parsed = settingsSchema.safeParse(input)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`invalid settings: ${detail}`, {
      code: ErrorCode.INVALID_SETTINGS,
    })
  }
  const data = parsed.data

  for (const scheme of data.allowedTransports) {
    if (!isTransportScheme(scheme)) {
      throw new ConfigError(`unknown transport "${scheme}" in allowedTransports`, {
        code: ErrorCode.DISALLOWED_TRANSPORT,
      })
    }
  }
  for (const entry of data.blacklist) {
    for (const scheme of entry.transports) {
      if (!isTransportScheme(scheme)) {
        throw new ConfigError(`unknown transport "${scheme}" in blacklist`, {
          code: ErrorCode.DISALLOWED_TRANSPORT,
        })
      }
    }
  }

  const inbound = data.inbound.map((addr) => normalizeAddress(addr))
  for (const addr of inbound) {
    if (addr.startsWith('tor')) {
      throw new ConfigError(`cannot listen on ${addr}: tor transports dial only`, {
        code: ErrorCode.DISALLOWED_TRANSPORT,
        context: { address: addr },
      })
    }
  }

  const proxy = parseProxyUrl(data.torSocksProxy)
  if (proxy === undefined) {
    throw new ConfigError(`torSocksProxy must be socks5://host:port, got ${data.torSocksProxy}`, {
      code: ErrorCode.INVALID_ADDRESS,
    })
  }

  return Object.freeze({
    ...data,
    inbound,
    externalAddrs: data.externalAddrs.map((addr) => normalizeAddress(addr)),
    peers: data.peers.map((addr) => normalizeAddress(addr)),
    seeds: data.seeds.map((addr) => normalizeAddress(addr)),
  })
}

export interface ProxyUrl {
  host: string
  port: number
  username?: string
  password?: string
}

export function parseProxyUrl(input: string): ProxyUrl | undefined {
  let url: URL
  try {
    url = new URL(input)
  } catch {
    return undefined
  }
  if (url.protocol !== 'socks5:' || url.hostname === '' || url.port === '') {
    return undefined
  }
  return {
    host: url.hostname,
    port: Number.parseInt(url.port, 10),
    username: url.username === '' ? undefined : decodeURIComponent(url.username),
    password: url.password === '' ? undefined : decodeURIComponent(url.password),
  }
}
