import type { Channel } from '../channel/channel'
import type { P2pHandle } from '../types'

/**
 * Per-channel message handler. `start` sends whatever the protocol opens
 * with and spawns its loops; it resolves once the protocol is running.
 */
export interface Protocol {
  readonly name: string
  start(): Promise<void>
}

export type ProtocolFactory = (channel: Channel, p2p: P2pHandle) => Protocol
