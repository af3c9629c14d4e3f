import debug from 'debug'
import { dialableSchemes } from '../address'
import type { Channel } from '../channel/channel'
import {
  AddrsCodec,
  type AddrsMessage,
  GetAddrsCodec,
  type GetAddrsMessage,
} from '../message/messages'
import type { Subscription } from '../system/subscriber'
import type { P2pHandle } from '../types'
import { ProtocolJobsManager } from './jobs-manager'
import type { Protocol } from './types'

const log = debug('meshwork:protocol:address')

/** Most entries sent in reply to one `getaddrs` */
export const MAX_ADDRS_REPLY = 256
/** Entries asked for when requesting addresses */
export const GETADDRS_REQUEST_MAX = 64

/**
 * Address gossip. Answers `getaddrs` from the host store and greylists the
 * entries of every `addrs` received. Outbound channels open by sending our
 * own addresses and asking for the peer's.
 */
export class ProtocolAddress implements Protocol {
  readonly name = 'address'
  private readonly jobs: ProtocolJobsManager
  private readonly getAddrsSub: Subscription<GetAddrsMessage>
  private readonly addrsSub: Subscription<AddrsMessage>

  constructor(
    private readonly channel: Channel,
    private readonly p2p: P2pHandle,
  ) {
    this.jobs = new ProtocolJobsManager(this.name, channel)
    this.getAddrsSub = channel.subscribeMsg(GetAddrsCodec)
    this.addrsSub = channel.subscribeMsg(AddrsCodec)
  }

  async start(): Promise<void> {
    this.jobs.start()
    this.jobs.spawn((signal) => this.handleGetAddrs(signal))
    this.jobs.spawn((signal) => this.handleAddrs(signal))

    if (this.channel.direction === 'outbound') {
      const own = this.p2p.hosts.selfAddrs()
      if (own.length > 0) await this.channel.send(AddrsCodec, { addrs: own })
      const { allowedTransports, transportMixing } = this.p2p.settings
      await this.channel.send(GetAddrsCodec, {
        max: GETADDRS_REQUEST_MAX,
        transports: dialableSchemes(allowedTransports, transportMixing),
      })
    }
  }

  private async handleGetAddrs(signal: AbortSignal): Promise<void> {
    for (;;) {
      const request = await this.getAddrsSub.receive(signal)
      const max = Math.min(request.max, MAX_ADDRS_REPLY)
      const addrs = this.p2p.hosts.fetchAddrs(request.transports, max)
      log('sending %d addrs to %s', addrs.length, this.channel.address)
      await this.channel.send(AddrsCodec, { addrs })
    }
  }

  private async handleAddrs(signal: AbortSignal): Promise<void> {
    for (;;) {
      const { addrs } = await this.addrsSub.receive(signal)
      if (addrs.length > MAX_ADDRS_REPLY) {
        await this.channel.ban(`sent ${addrs.length} addrs`)
        return
      }
      const stored = this.p2p.hosts.storeGreylist(addrs)
      log('greylisted %d of %d addrs from %s', stored, addrs.length, this.channel.address)
    }
  }
}
