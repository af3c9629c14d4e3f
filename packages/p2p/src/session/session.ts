import debug from 'debug'
import type { Channel } from '../channel/channel'
import { ProtocolVersion } from '../protocol/protocol-version'
import type { P2pHandle } from '../types'
import { SESSION_DEFAULT, type SessionFlag, matchesSession, sessionName } from './flags'

const log = debug('meshwork:session')

/**
 * Shared channel setup for every session: handshake, registration in the
 * connected set, protocol attachment.
 */
export abstract class Session {
  abstract readonly type: SessionFlag

  constructor(protected readonly p2p: P2pHandle) {}

  get name(): string {
    return sessionName(this.type)
  }

  abstract start(): Promise<void>
  abstract stop(): Promise<void>

  /**
   * Starts `channel`, runs the version handshake and the session's
   * protocols. Protocols subscribe before the channel starts so nothing the
   * peer sends right after its handshake is dropped. Any failure stops the
   * channel and rethrows.
   */
  async registerChannel(channel: Channel): Promise<void> {
    const version = new ProtocolVersion(channel, this.p2p.settings)
    const protocols = this.p2p.protocols.attach(this.type, channel, this.p2p)
    let handshaken = false
    try {
      channel.start()
      const remote = await version.run()
      handshaken = true

      if (matchesSession(SESSION_DEFAULT, this.type)) {
        if (!this.p2p.hosts.registerChannel(channel)) {
          throw new Error(`already connected to ${channel.address}`)
        }
        if (channel.direction === 'inbound') {
          this.p2p.hosts.storeGreylist(
            remote.externalAddrs.map((addr) => ({
              addr,
              lastSeen: Math.floor(remote.timestamp / 1000),
            })),
          )
        }
      }

      await Promise.all(protocols.map((protocol) => protocol.start()))
      log('%s session registered %s', this.name, channel.address)
    } catch (err) {
      if (!handshaken) this.p2p.metrics?.handshakeFailures.inc()
      await channel.stop(err instanceof Error ? err : new Error(String(err)))
      throw err
    }
  }
}
