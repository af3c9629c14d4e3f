import debug from 'debug'
import { randomU32 } from '@meshwork/utils'
import type { Channel } from '../channel/channel'
import { ErrorCode, ProtocolError } from '../errors'
import { type PingMessage, PingCodec, type PongMessage, PongCodec } from '../message/messages'
import type { Subscription } from '../system/subscriber'
import { sleep, withTimeout } from '../system/time'
import type { P2pHandle } from '../types'
import { ProtocolJobsManager } from './jobs-manager'
import type { Protocol } from './types'

const log = debug('meshwork:protocol:ping')

/**
 * Heartbeat. Pings every `channelHeartbeatInterval` and stops the channel if
 * no matching pong arrives within the same interval. Answers the peer's
 * pings.
 */
export class ProtocolPing implements Protocol {
  readonly name = 'ping'
  private readonly jobs: ProtocolJobsManager
  private readonly pingSub: Subscription<PingMessage>
  private readonly pongSub: Subscription<PongMessage>

  constructor(
    private readonly channel: Channel,
    private readonly p2p: P2pHandle,
  ) {
    this.jobs = new ProtocolJobsManager(this.name, channel)
    this.pingSub = channel.subscribeMsg(PingCodec)
    this.pongSub = channel.subscribeMsg(PongCodec)
  }

  async start(): Promise<void> {
    this.jobs.start()
    this.jobs.spawn((signal) => this.replyToPings(signal))
    this.jobs.spawn((signal) => this.heartbeat(signal))
  }

  private async heartbeat(signal: AbortSignal): Promise<void> {
    const interval = this.p2p.settings.channelHeartbeatInterval
    for (;;) {
      await sleep(interval, signal)
      const nonce = randomU32()
      const sentAt = Date.now()
      await this.channel.send(PingCodec, { nonce })

      try {
        await withTimeout(this.awaitPong(nonce, signal), interval, () =>
          new ProtocolError(`no pong from ${this.channel.address}`, {
            code: ErrorCode.HEARTBEAT_TIMEOUT,
            context: { address: this.channel.address },
          }),
          signal,
        )
      } catch (err) {
        if (err instanceof ProtocolError) {
          log('%s', err.message)
          await this.channel.stop(err)
          return
        }
        throw err
      }
      log('pong from %s after %dms', this.channel.address, Date.now() - sentAt)
    }
  }

  private async awaitPong(nonce: number, signal: AbortSignal): Promise<void> {
    for (;;) {
      const pong = await this.pongSub.receive(signal)
      if (pong.nonce === nonce) return
      log('stale pong from %s', this.channel.address)
    }
  }

  private async replyToPings(signal: AbortSignal): Promise<void> {
    for (;;) {
      const ping = await this.pingSub.receive(signal)
      await this.channel.send(PongCodec, { nonce: ping.nonce })
    }
  }
}
