import debug from 'debug'
import type { Duplex } from 'node:stream'
import { unbracketHost } from '@meshwork/utils'
import { type Address, parseAddress, schemeOf } from '../address'
import type { Listener } from '../transport/types'
import { SESSION_INBOUND } from './flags'
import { Session } from './session'

const log = debug('meshwork:session:inbound')

export interface InboundInfo {
  /** Configured address and the address actually bound */
  listeners: Array<{ address: Address; bound: Address }>
  channels: number
  handshaking: number
}

/**
 * Accepts connections on every inbound address, up to
 * `inboundConnections` channels at a time.
 */
export class InboundSession extends Session {
  override readonly type = SESSION_INBOUND
  private readonly listeners: Array<{ address: Address; listener: Listener }> = []
  private readonly accepting = new Set<Promise<void>>()

  override async start(): Promise<void> {
    for (const address of this.p2p.settings.inbound) {
      const listener = await this.p2p.transports.listen(address)
      listener.on('connection', (stream, remote) => this.onConnection(stream, remote))
      listener.on('error', (err) => this.p2p.logger.error(`listener ${address}: ${err.message}`))
      this.listeners.push({ address, listener })
      this.p2p.logger.info(`listening on ${listener.boundAddress}`)
    }
  }

  override async stop(): Promise<void> {
    await Promise.all(this.listeners.map(({ listener }) => listener.close()))
    this.listeners.length = 0
    const channels = this.p2p.hosts.channelList().filter((c) => c.sessionFlag === this.type)
    await Promise.all(channels.map((channel) => channel.stop()))
    await Promise.allSettled(this.accepting)
  }

  info(): InboundInfo {
    return {
      listeners: this.listeners.map(({ address, listener }) => ({
        address,
        bound: listener.boundAddress,
      })),
      channels: this.channelCount(),
      handshaking: this.accepting.size,
    }
  }

  private channelCount(): number {
    return this.p2p.hosts.channelList().filter((c) => c.sessionFlag === this.type).length
  }

  private onConnection(stream: Duplex, remote: Address): void {
    if (this.p2p.isStopped) {
      stream.destroy()
      return
    }
    if (this.channelCount() + this.accepting.size >= this.p2p.settings.inboundConnections) {
      log('inbound limit reached, refusing %s', remote)
      stream.destroy()
      return
    }
    if (this.isBlockedRemote(remote)) {
      log('refusing blocked peer %s', remote)
      stream.destroy()
      return
    }

    const accept: Promise<void> = this.accept(stream, remote).finally(() => {
      this.accepting.delete(accept)
    })
    this.accepting.add(accept)
  }

  private async accept(stream: Duplex, remote: Address): Promise<void> {
    const channel = this.p2p.createChannel({
      stream,
      address: remote,
      direction: 'inbound',
      sessionFlag: SESSION_INBOUND,
    })
    try {
      await this.registerChannel(channel)
      this.p2p.logger.info(`accepted inbound peer ${remote}`)
    } catch (err) {
      log('inbound %s failed: %s', remote, err instanceof Error ? err.message : String(err))
    }
  }

  private isBlockedRemote(remote: Address): boolean {
    if (this.p2p.hosts.isBlocked(remote)) return true
    const scheme = schemeOf(remote)
    if (scheme === 'unix') return false
    return this.p2p.hosts.isBlockedHost(unbracketHost(parseAddress(remote).hostname), scheme)
  }
}
