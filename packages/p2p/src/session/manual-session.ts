import debug from 'debug'
import { raceSignal } from 'race-signal'
import { safeTry } from '@meshwork/utils'
import type { Address } from '../address'
import type { Channel } from '../channel/channel'
import { Connector } from '../connector'
import { StoppableTask } from '../system/stoppable-task'
import { sleep } from '../system/time'
import type { P2pHandle } from '../types'
import { SESSION_MANUAL } from './flags'
import { Session } from './session'

const log = debug('meshwork:session:manual')

export interface ManualPeerInfo {
  address: Address
  connected: boolean
  channelId?: number
  /** Consecutive failed attempts */
  failures: number
}

interface ManualPeer {
  address: Address
  task: StoppableTask
  channel?: Channel
  failures: number
}

/**
 * Keeps every configured peer connected, reconnecting after
 * `outboundConnectTimeout` whenever the channel drops.
 */
export class ManualSession extends Session {
  override readonly type = SESSION_MANUAL
  private readonly connector: Connector
  private readonly peers: ManualPeer[] = []

  constructor(p2p: P2pHandle) {
    super(p2p)
    this.connector = new Connector(p2p, SESSION_MANUAL)
  }

  override async start(): Promise<void> {
    for (const address of this.p2p.settings.peers) {
      const peer: ManualPeer = { address, task: new StoppableTask(`manual ${address}`), failures: 0 }
      this.peers.push(peer)
      peer.task.start((signal) => this.connectLoop(peer, signal))
    }
  }

  override async stop(): Promise<void> {
    await Promise.all(this.peers.map((peer) => peer.task.stop()))
  }

  info(): ManualPeerInfo[] {
    return this.peers.map((peer) => ({
      address: peer.address,
      connected: peer.channel !== undefined && !peer.channel.isStopped,
      channelId: peer.channel?.id,
      failures: peer.failures,
    }))
  }

  private async connectLoop(peer: ManualPeer, signal: AbortSignal): Promise<void> {
    const limit = this.p2p.settings.manualAttemptLimit
    const retryDelay = this.p2p.settings.outboundConnectTimeout

    while (!signal.aborted) {
      const connected = await this.attempt(peer, signal)
      if (connected) {
        peer.failures = 0
      } else {
        peer.failures++
        if (limit > 0 && peer.failures >= limit) {
          this.p2p.logger.error(`giving up on manual peer ${peer.address} after ${limit} attempts`)
          return
        }
      }
      await sleep(retryDelay, signal)
    }
  }

  /** One connect attempt; returns after the channel dropped, false if it never came up. */
  private async attempt(peer: ManualPeer, signal: AbortSignal): Promise<boolean> {
    const hosts = this.p2p.hosts
    if (!hosts.tryClaim(peer.address)) {
      log('%s is busy elsewhere, retrying later', peer.address)
      return false
    }

    let channel: Channel
    try {
      const [connectErr, connected] = await safeTry(() => this.connector.connect(peer.address, signal))
      if (connectErr !== undefined) {
        log('connect to %s failed: %s', peer.address, connectErr.message)
        return false
      }
      channel = connected
      const [registerErr] = await safeTry(() => this.registerChannel(channel))
      if (registerErr !== undefined) {
        log('handshake with %s failed: %s', peer.address, registerErr.message)
        return false
      }
    } finally {
      hosts.release(peer.address)
    }

    peer.channel = channel
    this.p2p.logger.info(`connected to manual peer ${peer.address}`)
    try {
      await raceSignal(channel.closed, signal)
      this.p2p.logger.info(`manual peer ${peer.address} disconnected`)
    } finally {
      if (signal.aborted) await channel.stop()
      peer.channel = undefined
    }
    return true
  }
}
