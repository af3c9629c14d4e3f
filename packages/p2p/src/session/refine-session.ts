import debug from 'debug'
import { raceSignal } from 'race-signal'
import { safeTry, unixTimestamp } from '@meshwork/utils'
import { type Address, dialableSchemes } from '../address'
import type { Channel } from '../channel/channel'
import { Connector } from '../connector'
import { HostColor } from '../hosts/container'
import { StoppableTask } from '../system/stoppable-task'
import { sleep } from '../system/time'
import type { P2pHandle } from '../types'
import { SESSION_REFINE } from './flags'
import { Session } from './session'

const log = debug('meshwork:session:refine')

export interface RefineryInfo {
  running: boolean
  inflight: number
}

/**
 * Probes greylisted hosts and promotes the ones that answer a handshake to
 * the whitelist. Also checks our own external addresses are reachable.
 */
export class RefineSession extends Session {
  override readonly type = SESSION_REFINE
  private readonly connector: Connector
  private readonly refinery = new StoppableTask('greylist refinery')
  private readonly selfHandshake = new StoppableTask('self handshake')
  private readonly inflight = new Set<Promise<void>>()
  /** Channels of probes still connecting or handshaking */
  private readonly probing = new Set<Channel>()

  constructor(p2p: P2pHandle) {
    super(p2p)
    this.connector = new Connector(p2p, SESSION_REFINE)
  }

  override async start(): Promise<void> {
    const interval = this.p2p.settings.greylistRefineryInterval
    this.refinery.start(async (signal) => {
      for (;;) {
        await sleep(interval, signal)
        await this.refineOnce(signal)
      }
    })
    if (this.p2p.settings.externalAddrs.length > 0) {
      this.selfHandshake.start(async (signal) => {
        for (;;) {
          await sleep(interval, signal)
          await this.checkSelf(signal)
        }
      })
    }
  }

  override async stop(): Promise<void> {
    await this.refinery.stop()
    await this.selfHandshake.stop()
    await Promise.all([...this.probing].map((channel) => channel.stop()))
    await Promise.allSettled(this.inflight)
  }

  info(): RefineryInfo {
    return { running: this.refinery.isRunning, inflight: this.inflight.size }
  }

  /**
   * One refinery iteration without the sleep: probe a random greylist
   * entry and move it to the whitelist or drop it. Blocked entries are
   * dropped without a dial.
   */
  async refineOnce(signal?: AbortSignal): Promise<void> {
    const { hosts, settings } = this.p2p
    if (hosts.container.isEmpty(HostColor.Grey)) return

    const idle = hosts.timeWithoutChannels()
    if (idle >= settings.timeWithNoConnections) {
      log('no connections for %dms, refinery paused', idle)
      return
    }

    const schemes = dialableSchemes(settings.allowedTransports, settings.transportMixing)
    const fetched = hosts.container.fetchRandom(HostColor.Grey, schemes)
    if (fetched === undefined) return
    const { entry, position } = fetched
    if (hosts.isBlocked(entry.addr)) {
      hosts.container.removeAt(HostColor.Grey, entry.addr, position)
      hosts.updateSizes()
      log('%s is blocked, removed from greylist', entry.addr)
      return
    }
    if (!hosts.tryClaim(entry.addr)) {
      log('%s is busy, skipping', entry.addr)
      return
    }

    const probe: Promise<void> = this.probe(entry.addr, position).finally(() => {
      this.inflight.delete(probe)
    })
    this.inflight.add(probe)
    if (signal === undefined) await probe
    else await raceSignal(probe, signal)
  }

  /**
   * Connects to `addr` and runs the version handshake, then disconnects.
   * Resolves true when the handshake completed.
   */
  async handshakeNode(addr: Address): Promise<boolean> {
    const [connectErr, channel] = await safeTry(() => this.connector.connect(addr))
    if (connectErr !== undefined) {
      log('probe of %s: connect failed: %s', addr, connectErr.message)
      return false
    }
    this.probing.add(channel)
    if (this.p2p.isStopped) await channel.stop()
    const [handshakeErr] = await safeTry(() => this.registerChannel(channel))
    await channel.stop()
    this.probing.delete(channel)
    if (handshakeErr !== undefined) {
      log('probe of %s: handshake failed: %s', addr, handshakeErr.message)
      return false
    }
    return true
  }

  private async probe(addr: Address, position: number): Promise<void> {
    const { hosts, metrics, dnet } = this.p2p
    try {
      const ok = await this.handshakeNode(addr)
      if (!ok && this.p2p.isStopped) {
        log('probe of %s cut short by shutdown', addr)
        return
      }
      hosts.container.removeAt(HostColor.Grey, addr, position)
      if (ok) {
        hosts.container.storeOrUpdate(HostColor.White, [{ addr, lastSeen: unixTimestamp() }])
        log('%s answered, whitelisted', addr)
      } else {
        log('%s did not answer, removed from greylist', addr)
      }
      hosts.updateSizes()
      metrics?.refineryProbes.inc({ result: ok ? 'success' : 'failure' })
      if (dnet.enabled) dnet.emit('refinery:probe', { address: addr, success: ok })
    } finally {
      hosts.release(addr)
    }
  }

  private async checkSelf(signal: AbortSignal): Promise<void> {
    for (const addr of this.p2p.settings.externalAddrs) {
      if (signal.aborted) return
      if (await this.handshakeNode(addr)) {
        this.p2p.hosts.markSelfReachable(addr)
      } else {
        this.p2p.logger.warn(`external address ${addr} is not reachable`)
      }
    }
  }
}
