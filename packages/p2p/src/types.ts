import type { NetworkMetrics } from '@meshwork/metrics'
import type { Duplex } from 'node:stream'
import type { Address } from './address'
import type { Channel, ChannelDirection } from './channel/channel'
import type { Dnet } from './dnet'
import type { Hosts } from './hosts/hosts'
import type { Logger } from './logging'
import type { MessageCodec } from './message/codec'
import type { ProtocolRegistry } from './protocol/registry'
import type { SessionFlag } from './session/flags'
import type { Settings } from './settings'
import type { Transport } from './transport/types'

export interface CreateChannelInit {
  stream: Duplex
  address: Address
  direction: ChannelDirection
  sessionFlag: SessionFlag
}

/**
 * What sessions and protocols see of the coordinator.
 */
export interface P2pHandle {
  readonly settings: Settings
  readonly hosts: Hosts
  readonly protocols: ProtocolRegistry
  readonly transports: Transport
  readonly dnet: Dnet
  readonly logger: Logger
  readonly metrics?: NetworkMetrics
  /** True once shutdown has begun; no new channels are created after that */
  readonly isStopped: boolean
  createChannel(init: CreateChannelInit): Channel
  broadcast<T>(codec: MessageCodec<T>, message: T): Promise<void>
  /** Queries the seed nodes again; concurrent calls share one run */
  reseed(): Promise<void>
}
