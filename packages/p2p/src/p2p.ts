/**
 * P2p - the networking coordinator
 *
 * Owns settings, the host registry, the protocol registry, transports and
 * the five sessions, and drives them through one lifecycle:
 * open -> start -> started -> run -> stopped.
 */

import { AlreadyStartedError, NotStartedError } from '@libp2p/interface'
import debug from 'debug'
import type { NetworkMetrics } from '@meshwork/metrics'
import { safeTry } from '@meshwork/utils'
import type { Address } from './address'
import { Channel } from './channel/channel'
import type { ChannelInfo } from './channel/channel'
import { Dnet } from './dnet'
import { HOST_COLORS, colorName } from './hosts/container'
import { Hosts } from './hosts/hosts'
import { type Logger, getLogger } from './logging'
import type { MessageCodec } from './message/codec'
import { registerDefaultProtocols } from './protocol'
import { ProtocolRegistry } from './protocol/registry'
import type { ProtocolFactory } from './protocol/types'
import { SESSION_DEFAULT, matchesSession } from './session/flags'
import { InboundSession, type InboundInfo } from './session/inbound-session'
import { ManualSession, type ManualPeerInfo } from './session/manual-session'
import { OutboundSession, type SlotInfo } from './session/outbound-session'
import { RefineSession, type RefineryInfo } from './session/refine-session'
import { SeedSession } from './session/seed-session'
import { type Settings, type SettingsInput, createSettings } from './settings'
import { Subscriber, type Subscription } from './system/subscriber'
import { Transports } from './transport'
import type { Transport } from './transport/types'
import type { CreateChannelInit, P2pHandle } from './types'

const log = debug('meshwork:p2p')

export type P2pState = 'open' | 'start' | 'started' | 'run' | 'stopped'

export interface P2pOptions {
  /** Replaces the built-in transports, e.g. with an in-memory one */
  transports?: Transport
  logger?: Logger
  metrics?: NetworkMetrics
}

export interface P2pInfo {
  state: P2pState
  nodeId: string
  externalAddrs: Address[]
  dnet: boolean
  sessions: {
    outbound: SlotInfo[]
    inbound: InboundInfo
    manual: ManualPeerInfo[]
    refine: RefineryInfo
  }
  channels: ChannelInfo[]
  hosts: Record<string, number> & { pending: number; migrating: number }
}

export class P2p implements P2pHandle {
  readonly settings: Settings
  readonly hosts: Hosts
  readonly protocols = new ProtocolRegistry()
  readonly transports: Transport
  readonly dnet = new Dnet()
  readonly logger: Logger
  readonly metrics?: NetworkMetrics

  private readonly seedSession: SeedSession
  private readonly manualSession: ManualSession
  private readonly inboundSession: InboundSession
  private readonly outboundSession: OutboundSession
  private readonly refineSession: RefineSession
  private readonly stopSubscriber = new Subscriber<void>()
  private readonly stopController = new AbortController()
  private _state: P2pState = 'open'
  private running?: Promise<void>
  private stopping?: Promise<void>
  private hostsLoaded = false

  constructor(settings: Settings | SettingsInput = {}, options: P2pOptions = {}) {
    this.settings = isSettings(settings) ? settings : createSettings(settings)
    this.logger = options.logger ?? getLogger({ label: 'p2p' })
    this.metrics = options.metrics
    this.hosts = new Hosts(this.settings, this.metrics)
    this.transports = options.transports ?? new Transports(this.settings)

    this.seedSession = new SeedSession(this)
    this.manualSession = new ManualSession(this)
    this.inboundSession = new InboundSession(this)
    this.outboundSession = new OutboundSession(this)
    this.refineSession = new RefineSession(this)

    registerDefaultProtocols(this.protocols)
  }

  get state(): P2pState {
    return this._state
  }

  get isStopped(): boolean {
    return this._state === 'stopped' || this.stopController.signal.aborted
  }

  get refinery(): RefineSession {
    return this.refineSession
  }

  /**
   * Loads the host file and bootstraps the greylist from the seeds. A host
   * file that cannot be read leaves the node stopped and rethrows.
   */
  async start(): Promise<void> {
    if (this._state !== 'open') {
      throw new AlreadyStartedError(`cannot start from state ${this._state}`)
    }
    this._state = 'start'
    this.logger.info('starting p2p')

    if (this.settings.hostlist !== '') {
      const hostlist = this.settings.hostlist
      const [loadErr, loaded] = await safeTry(() => this.hosts.container.load(hostlist))
      if (loadErr !== undefined) {
        this.logger.error(`cannot load hosts from ${hostlist}: ${loadErr.message}`)
        await this.stop()
        throw loadErr
      }
      this.hostsLoaded = true
      this.hosts.pruneBlacklisted()
      this.hosts.updateSizes()
      this.logger.info(`loaded ${loaded} hosts from ${hostlist}`)
    }
    await this.seedSession.start()

    if (this._state === 'start') this._state = 'started'
  }

  /**
   * Starts the manual, inbound, outbound and refine sessions and resolves
   * once `stop()` has shut everything down.
   */
  run(): Promise<void> {
    if (this._state !== 'started') {
      return Promise.reject(new NotStartedError(`cannot run from state ${this._state}`))
    }
    this._state = 'run'
    this.running = this.runSessions()
    return this.running
  }

  /**
   * Stops the node. While running this unblocks `run()` and waits for its
   * shutdown; otherwise it shuts down directly. Idempotent.
   */
  async stop(): Promise<void> {
    if (this.stopping !== undefined) return this.stopping
    this.stopController.abort()
    this.stopping = this.running ?? this.shutdown([])
    await this.stopping
  }

  register(sessions: number, factory: ProtocolFactory): void {
    this.protocols.register(sessions, factory)
  }

  createChannel(init: CreateChannelInit): Channel {
    return new Channel({
      ...init,
      banPolicy: this.settings.banPolicy,
      onBan: (channel) => this.hosts.ban(channel.address),
      dnet: this.dnet,
      metrics: this.metrics,
    })
  }

  /** Sends `message` to every connected channel. Failed sends stop only that channel. */
  async broadcast<T>(codec: MessageCodec<T>, message: T): Promise<void> {
    await this.broadcastWithExclude(codec, message, [])
  }

  async broadcastWithExclude<T>(
    codec: MessageCodec<T>,
    message: T,
    exclude: readonly Address[],
  ): Promise<void> {
    const targets = this.channels().filter((c) => !exclude.includes(c.address))
    if (targets.length === 0) {
      log('broadcast %s: no channels', codec.name)
      return
    }
    const results = await Promise.allSettled(targets.map((c) => c.send(codec, message)))
    const failed = results.filter((r) => r.status === 'rejected').length
    log('broadcast %s to %d channel(s), %d failed', codec.name, targets.length, failed)
  }

  channels(): Channel[] {
    return this.hosts.channelList()
  }

  randomChannel(): Channel | undefined {
    const channels = this.channels()
    if (channels.length === 0) return undefined
    return channels[Math.floor(Math.random() * channels.length)]
  }

  exists(addr: Address): boolean {
    return this.hosts.isConnected(addr)
  }

  subscribeChannel(): Subscription<Channel> {
    return this.hosts.subscribeChannel()
  }

  /** Notified once, when the node has fully stopped */
  subscribeStop(): Subscription<void> {
    return this.stopSubscriber.subscribe()
  }

  reseed(): Promise<void> {
    return this.seedSession.start()
  }

  dnetEnable(): void {
    this.dnet.enable()
    this.logger.info('dnet enabled')
  }

  dnetDisable(): void {
    this.dnet.disable()
    this.logger.info('dnet disabled')
  }

  getInfo(): P2pInfo {
    const hosts: P2pInfo['hosts'] = {
      pending: this.hosts.pendingCount,
      migrating: this.hosts.migratingCount,
    }
    for (const color of HOST_COLORS) {
      hosts[colorName(color)] = this.hosts.container.size(color)
    }
    return {
      state: this._state,
      nodeId: this.settings.nodeId,
      externalAddrs: [...this.settings.externalAddrs],
      dnet: this.dnet.enabled,
      sessions: {
        outbound: this.outboundSession.slotInfo(),
        inbound: this.inboundSession.info(),
        manual: this.manualSession.info(),
        refine: this.refineSession.info(),
      },
      channels: this.channels()
        .filter((c) => matchesSession(SESSION_DEFAULT, c.sessionFlag))
        .map((c) => c.info()),
      hosts,
    }
  }

  private async runSessions(): Promise<void> {
    const started: Array<{ stop(): Promise<void> }> = []
    try {
      for (const session of [
        this.manualSession,
        this.inboundSession,
        this.outboundSession,
        this.refineSession,
      ]) {
        await session.start()
        started.unshift(session)
      }
      this.logger.info('p2p running')
      await new Promise<void>((resolve) => {
        const signal = this.stopController.signal
        if (signal.aborted) resolve()
        else signal.addEventListener('abort', () => resolve(), { once: true })
      })
    } finally {
      await this.shutdown(started)
    }
  }

  private async shutdown(sessions: Array<{ stop(): Promise<void> }>): Promise<void> {
    this.logger.info('stopping p2p')
    this.stopController.abort()
    for (const session of sessions) await session.stop()
    await this.seedSession.stop()
    await Promise.all(this.channels().map((c) => c.stop()))

    if (this.hostsLoaded) {
      try {
        await this.hosts.container.save(this.settings.hostlist)
      } catch (err) {
        this.logger.error(
          `saving hosts to ${this.settings.hostlist} failed: ${err instanceof Error ? err.message : String(err)}`,
        )
      }
    }

    this._state = 'stopped'
    this.stopSubscriber.notify()
    this.logger.info('p2p stopped')
  }
}

function isSettings(value: Settings | SettingsInput): value is Settings {
  return Object.isFrozen(value)
}
