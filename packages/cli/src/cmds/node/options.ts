import type { Options } from 'yargs'
import { z } from 'zod'

const list = z.array(z.string()).optional()
const count = z.number().int().nonnegative().optional()

/**
 * Arguments of the `node` command after yargs has parsed them. Unset flags
 * stay undefined so they do not override the config file.
 */
export const nodeArgsSchema = z.object({
  config: z.string().optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Network
  nodeId: z.string().optional(),
  inbound: list,
  externalAddrs: list,
  peers: list,
  seeds: list,
  allowedTransports: list,
  transportMixing: z.boolean().optional(),
  torSocksProxy: z.string().optional(),
  localnet: z.boolean().optional(),

  // Connections
  outboundConnections: count,
  inboundConnections: count,
  hostlist: z.string().optional(),

  // Metrics
  metricsEnabled: z.boolean().optional(),
  metricsAddress: z.string().optional(),
  metricsPort: z.number().int().min(0).max(65535).optional(),
})

export type NodeArgs = z.output<typeof nodeArgsSchema>

type NodeFlag = Exclude<keyof NodeArgs, 'config' | 'logLevel'>

export const nodeOptions: Record<NodeFlag, Options> = {
  // ============================================================================
  // Network
  // ============================================================================
  nodeId: {
    description: 'Identity string sent in the version handshake',
    type: 'string',
    group: 'Network:',
  },
  inbound: {
    description: 'Addresses to accept connections on, e.g. tcp+tls://0.0.0.0:26661',
    type: 'string',
    array: true,
    group: 'Network:',
  },
  externalAddrs: {
    description: 'Addresses advertised to peers',
    type: 'string',
    array: true,
    group: 'Network:',
  },
  peers: {
    description: 'Peers to keep connected',
    type: 'string',
    array: true,
    group: 'Network:',
  },
  seeds: {
    description: 'Seed nodes queried for addresses at startup',
    type: 'string',
    array: true,
    group: 'Network:',
  },
  allowedTransports: {
    description: 'Transports this node may use',
    type: 'string',
    array: true,
    group: 'Network:',
  },
  transportMixing: {
    description: 'Reach tcp peers over tor and tcp+tls peers over tor+tls',
    type: 'boolean',
    group: 'Network:',
  },
  torSocksProxy: {
    description: 'SOCKS5 proxy for tor transports',
    type: 'string',
    group: 'Network:',
  },
  localnet: {
    description: 'Accept local and private addresses',
    type: 'boolean',
    group: 'Network:',
  },

  // ============================================================================
  // Connections
  // ============================================================================
  outboundConnections: {
    description: 'Number of outbound slots',
    type: 'number',
    group: 'Connections:',
  },
  inboundConnections: {
    description: 'Maximum number of inbound channels',
    type: 'number',
    group: 'Connections:',
  },
  hostlist: {
    description: 'File the host store is loaded from and saved to',
    type: 'string',
    group: 'Connections:',
  },

  // ============================================================================
  // Metrics
  // ============================================================================
  metricsEnabled: {
    description: 'Serve Prometheus metrics over HTTP',
    type: 'boolean',
    group: 'Metrics:',
  },
  metricsAddress: {
    description: 'Metrics server listening address (default 127.0.0.1)',
    type: 'string',
    group: 'Metrics:',
  },
  metricsPort: {
    description: 'Metrics server port (default 8008)',
    type: 'number',
    group: 'Metrics:',
  },
}
