import { SESSION_DEFAULT, SESSION_SEED } from '../session/flags'
import { ProtocolAddress } from './protocol-address'
import { ProtocolPing } from './protocol-ping'
import type { ProtocolRegistry } from './registry'
import { ProtocolSeed } from './protocol-seed'

export * from './jobs-manager'
export * from './protocol-address'
export * from './protocol-ping'
export * from './protocol-seed'
export * from './protocol-version'
export * from './registry'
export * from './types'

/**
 * Registers the protocols every node runs: ping and address gossip on
 * regular channels, the seed exchange on seed channels.
 */
export function registerDefaultProtocols(registry: ProtocolRegistry): void {
  registry.register(SESSION_DEFAULT, (channel, p2p) => new ProtocolPing(channel, p2p))
  registry.register(SESSION_DEFAULT, (channel, p2p) => new ProtocolAddress(channel, p2p))
  registry.register(SESSION_SEED, (channel, p2p) => new ProtocolSeed(channel, p2p))
}
