import debug from 'debug'
import type { Channel } from '../channel/channel'
import { matchesSession, type SessionFlag } from '../session/flags'
import type { P2pHandle } from '../types'
import type { Protocol, ProtocolFactory } from './types'

const log = debug('meshwork:protocol:registry')

interface Registration {
  sessions: number
  factory: ProtocolFactory
}

/**
 * Protocol factories keyed by the sessions they run under. Every channel
 * that completes its handshake gets one instance of each matching protocol.
 */
export class ProtocolRegistry {
  private readonly registrations: Registration[] = []

  /**
   * Registers `factory` for channels of every session in the `sessions`
   * bitmask.
   */
  register(sessions: number, factory: ProtocolFactory): void {
    this.registrations.push({ sessions, factory })
  }

  attach(flag: SessionFlag, channel: Channel, p2p: P2pHandle): Protocol[] {
    const protocols = this.registrations
      .filter((r) => matchesSession(r.sessions, flag))
      .map((r) => r.factory(channel, p2p))
    log('attached [%s] to %s', protocols.map((p) => p.name).join(', '), channel.address)
    return protocols
  }

  get size(): number {
    return this.registrations.length
  }
}
