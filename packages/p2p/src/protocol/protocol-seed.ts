import debug from 'debug'
import { dialableSchemes } from '../address'
import type { Channel } from '../channel/channel'
import { ErrorCode, ProtocolError } from '../errors'
import { AddrsCodec, type AddrsMessage, GetAddrsCodec } from '../message/messages'
import type { Subscription } from '../system/subscriber'
import { withTimeout } from '../system/time'
import type { P2pHandle } from '../types'
import { MAX_ADDRS_REPLY } from './protocol-address'
import type { Protocol } from './types'

const log = debug('meshwork:protocol:seed')

/**
 * One-shot address exchange with a seed node: advertise our addresses,
 * request the seed's and greylist what comes back.
 */
export class ProtocolSeed implements Protocol {
  readonly name = 'seed'
  private readonly addrsSub: Subscription<AddrsMessage>

  constructor(
    private readonly channel: Channel,
    private readonly p2p: P2pHandle,
  ) {
    this.addrsSub = channel.subscribeMsg(AddrsCodec)
  }

  async start(): Promise<void> {
    const { settings, hosts } = this.p2p
    try {
      const own = hosts.selfAddrs()
      if (own.length > 0) await this.channel.send(AddrsCodec, { addrs: own })
      await this.channel.send(GetAddrsCodec, {
        max: MAX_ADDRS_REPLY,
        transports: dialableSchemes(settings.allowedTransports, settings.transportMixing),
      })

      const { addrs } = await withTimeout(
        this.addrsSub.receive(),
        settings.channelHandshakeTimeout,
        () =>
          new ProtocolError(`seed ${this.channel.address} sent no addrs`, {
            code: ErrorCode.REQUEST_TIMEOUT,
            context: { address: this.channel.address },
          }),
      )
      const stored = hosts.storeGreylist(addrs.slice(0, MAX_ADDRS_REPLY))
      log('seed %s: greylisted %d of %d addrs', this.channel.address, stored, addrs.length)
    } finally {
      this.addrsSub.unsubscribe()
    }
  }
}
