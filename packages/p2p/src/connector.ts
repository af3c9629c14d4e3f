import debug from 'debug'
import type { Duplex } from 'node:stream'
import type { Address } from './address'
import type { Channel } from './channel/channel'
import { ChannelStoppedError } from './errors'
import type { SessionFlag } from './session/flags'
import type { P2pHandle } from './types'

const log = debug('meshwork:connector')

/**
 * Dials an address and wraps the stream in an outbound channel owned by
 * one session. The channel is not started.
 */
export class Connector {
  constructor(
    private readonly p2p: P2pHandle,
    private readonly sessionFlag: SessionFlag,
  ) {}

  async connect(addr: Address, signal?: AbortSignal): Promise<Channel> {
    if (this.p2p.isStopped) throw new ChannelStoppedError(addr)
    const metrics = this.p2p.metrics
    let stream: Duplex
    try {
      stream = await this.p2p.transports.dial(addr, {
        timeout: this.p2p.settings.outboundConnectTimeout,
        signal,
      })
    } catch (err) {
      metrics?.connectionAttempts.inc({ status: 'failure' })
      log('dial %s failed: %s', addr, err instanceof Error ? err.message : String(err))
      throw err
    }
    metrics?.connectionAttempts.inc({ status: 'success' })

    if (this.p2p.isStopped) {
      stream.destroy()
      throw new ChannelStoppedError(addr)
    }
    return this.p2p.createChannel({
      stream,
      address: addr,
      direction: 'outbound',
      sessionFlag: this.sessionFlag,
    })
  }
}
