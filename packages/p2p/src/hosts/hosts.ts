import debug from 'debug'
import { shuffle } from 'radash'
import type { NetworkMetrics } from '@meshwork/metrics'
import { isLocalHost, isLoopback, unbracketHost, unixTimestamp } from '@meshwork/utils'
import {
  type Address,
  dialableSchemes,
  parseAddress,
  schemeOf,
  TRANSPORT_SCHEMES,
  tryNormalizeAddress,
} from '../address'
import type { Channel } from '../channel/channel'
import type { AddrEntry } from '../message/messages'
import type { BlacklistEntry, Settings } from '../settings'
import { Subscriber, type Subscription } from '../system/subscriber'
import { colorName, HOST_COLORS, HostColor, HostContainer, type HostEntry } from './container'

const log = debug('meshwork:hosts')

/** Tiers tried, in order, when a slot's preferred tier has no candidate */
const FALLBACK_ORDER = [HostColor.Anchor, HostColor.Gold, HostColor.White, HostColor.Grey]

export type HostsSettings = Pick<
  Settings,
  | 'allowedTransports'
  | 'transportMixing'
  | 'localnet'
  | 'blacklist'
  | 'externalAddrs'
  | 'peers'
  | 'goldConnectCount'
  | 'whiteConnectPercent'
  | 'slotPreferenceStrict'
>

function hostPort(addr: Address): { host: string; port?: number } | undefined {
  let url: URL
  try {
    url = parseAddress(addr)
  } catch {
    return undefined
  }
  if (url.protocol === 'unix:') return { host: url.pathname }
  return { host: unbracketHost(url.hostname), port: Number.parseInt(url.port, 10) }
}

function ruleMatches(rule: BlacklistEntry, scheme: string, host: string, port?: number): boolean {
  if (rule.host.toLowerCase() !== host.toLowerCase()) return false
  if (rule.transports.length > 0 && !rule.transports.includes(scheme)) return false
  if (rule.ports.length > 0 && (port === undefined || !rule.ports.includes(port))) return false
  return true
}

/**
 * The host registry: tiers, dial claims, the connected channel set and the
 * address policy (blacklist, self and locality filtering).
 */
export class Hosts {
  readonly container = new HostContainer()
  private readonly pending = new Set<Address>()
  private readonly migrating = new Set<Address>()
  private readonly channels = new Map<Address, Channel>()
  private readonly channelSubscriber = new Subscriber<Channel>()
  /** External addresses that passed a self handshake, with when they did */
  private readonly verifiedSelf = new Map<Address, number>()
  private lastConnection = Date.now()

  constructor(
    private readonly settings: HostsSettings,
    private readonly metrics?: NetworkMetrics,
  ) {}

  // ---------- claims ----------

  /**
   * Marks `addr` pending and migrating. Fails if it already is either, or
   * is connected.
   */
  tryClaim(addr: Address): boolean {
    if (this.pending.has(addr) || this.migrating.has(addr) || this.channels.has(addr)) {
      return false
    }
    this.pending.add(addr)
    this.migrating.add(addr)
    return true
  }

  release(addr: Address): void {
    this.pending.delete(addr)
    this.migrating.delete(addr)
  }

  get pendingCount(): number {
    return this.pending.size
  }

  get migratingCount(): number {
    return this.migrating.size
  }

  isPending(addr: Address): boolean {
    return this.pending.has(addr)
  }

  isMigrating(addr: Address): boolean {
    return this.migrating.has(addr)
  }

  // ---------- connected channels ----------

  /**
   * Adds a handshaken channel to the connected set and removes it again
   * when it stops. Returns false if another channel holds the address.
   */
  registerChannel(channel: Channel): boolean {
    if (channel.isStopped || this.channels.has(channel.address)) return false
    this.channels.set(channel.address, channel)
    this.lastConnection = Date.now()
    this.metrics?.peerCount.set(this.channels.size)
    this.metrics?.peerConnections.inc({ direction: channel.direction })
    channel.once('stopped', () => this.unregisterChannel(channel))
    this.channelSubscriber.notify(channel)
    log('registered %s channel %s', channel.direction, channel.address)
    return true
  }

  unregisterChannel(channel: Channel): void {
    if (this.channels.get(channel.address) !== channel) return
    this.channels.delete(channel.address)
    this.lastConnection = Date.now()
    this.metrics?.peerCount.set(this.channels.size)
    this.metrics?.peerDisconnections.inc()
    log('unregistered channel %s', channel.address)
  }

  getChannel(addr: Address): Channel | undefined {
    return this.channels.get(addr)
  }

  isConnected(addr: Address): boolean {
    return this.channels.has(addr)
  }

  channelList(): Channel[] {
    return [...this.channels.values()]
  }

  subscribeChannel(): Subscription<Channel> {
    return this.channelSubscriber.subscribe()
  }

  /** Milliseconds since a channel was last registered or dropped, 0 while any is connected */
  timeWithoutChannels(now = Date.now()): number {
    return this.channels.size > 0 ? 0 : now - this.lastConnection
  }

  // ---------- policy ----------

  isBlacklisted(addr: Address): boolean {
    const parts = hostPort(addr)
    if (parts === undefined) return false
    const scheme = schemeOf(addr)
    return this.settings.blacklist.some((rule) => ruleMatches(rule, scheme, parts.host, parts.port))
  }

  /** Blacklisted by a rule or held in the black tier */
  isBlocked(addr: Address): boolean {
    return this.container.containsIn(HostColor.Black, addr) || this.isBlacklisted(addr)
  }

  /**
   * Whether a connection arriving from `host` must be refused: a rule
   * names the host for this scheme, or any black tier entry has it.
   */
  isBlockedHost(host: string, scheme: string): boolean {
    const bare = unbracketHost(host).toLowerCase()
    if (this.settings.blacklist.some((rule) => ruleMatches(rule, scheme, bare))) return true
    return this.container
      .fetchAll(HostColor.Black)
      .some((e) => hostPort(e.addr)?.host.toLowerCase() === bare)
  }

  /**
   * Evicts entries a blacklist rule names from every tier but black. Run
   * after loading the host file, which may predate the rules.
   */
  pruneBlacklisted(): number {
    let pruned = 0
    for (const color of HOST_COLORS) {
      if (color === HostColor.Black) continue
      for (const { addr } of this.container.fetchAll(color)) {
        if (this.isBlacklisted(addr) && this.container.evict(addr, color)) pruned++
      }
    }
    if (pruned > 0) {
      log('pruned %d blacklisted hosts', pruned)
      this.updateSizes()
    }
    return pruned
  }

  isSelf(addr: Address): boolean {
    if (this.settings.externalAddrs.includes(addr)) return true
    if (!this.settings.localnet) return false
    const parts = hostPort(addr)
    if (parts?.port === undefined || !isLoopback(parts.host)) return false
    return this.settings.externalAddrs.some((own) => hostPort(own)?.port === parts.port)
  }

  /**
   * Drops addresses that are malformed, our own, blocked, or local while
   * not on a local network. Normalizes the survivors and keeps the newest
   * `lastSeen` of duplicates.
   */
  filterAddresses(entries: readonly AddrEntry[]): HostEntry[] {
    const kept = new Map<Address, number>()
    for (const { addr: raw, lastSeen } of entries) {
      const addr = tryNormalizeAddress(raw)
      if (addr === undefined) continue
      if (this.isSelf(addr) || this.isBlocked(addr)) continue
      if (!this.settings.localnet) {
        if (schemeOf(addr) === 'unix') continue
        const parts = hostPort(addr)
        if (parts === undefined || isLocalHost(parts.host)) continue
      }
      kept.set(addr, Math.max(lastSeen, kept.get(addr) ?? 0))
    }
    return [...kept].map(([addr, lastSeen]) => ({ addr, lastSeen }))
  }

  /** Filters `entries` and stores the survivors in the greylist. */
  storeGreylist(entries: readonly AddrEntry[]): number {
    const stored = this.container.storeOrUpdate(HostColor.Grey, this.filterAddresses(entries))
    this.updateSizes()
    return stored
  }

  // ---------- exchange ----------

  /**
   * Entries to answer a `getaddrs` with: anchor, gold and white hosts on
   * the requested schemes (any scheme when none are named), shuffled.
   */
  fetchAddrs(transports: readonly string[], max: number): AddrEntry[] {
    const schemes = transports.length > 0 ? transports : TRANSPORT_SCHEMES
    const candidates = [HostColor.Anchor, HostColor.Gold, HostColor.White].flatMap((color) =>
      this.container.fetchWithSchemes(color, schemes),
    )
    return shuffle(candidates).slice(0, max)
  }

  /** Our external addresses, stamped with the last time they were reachable */
  selfAddrs(): AddrEntry[] {
    const now = unixTimestamp()
    return this.settings.externalAddrs.map((addr) => ({
      addr,
      lastSeen: this.verifiedSelf.get(addr) ?? now,
    }))
  }

  markSelfReachable(addr: Address, lastSeen = unixTimestamp()): void {
    this.verifiedSelf.set(addr, lastSeen)
  }

  // ---------- outbound ----------

  /**
   * Picks and claims a dial candidate for outbound slot `slot`, or returns
   * undefined when no tier has one.
   */
  selectOutbound(slot: number): Address | undefined {
    const preferred = this.preferredColors(slot)
    const order = this.settings.slotPreferenceStrict
      ? preferred
      : [...preferred, ...FALLBACK_ORDER.filter((c) => !preferred.includes(c))]
    const schemes = dialableSchemes(this.settings.allowedTransports, this.settings.transportMixing)

    for (const color of order) {
      for (const entry of shuffle(this.container.fetchWithSchemes(color, schemes))) {
        if (!this.isCandidate(entry.addr)) continue
        if (this.tryClaim(entry.addr)) return entry.addr
      }
    }
    return undefined
  }

  /** An outbound connection succeeded: the host becomes gold. */
  markConnected(addr: Address): void {
    if (this.container.containsIn(HostColor.Anchor, addr)) {
      this.container.storeOrUpdate(HostColor.Anchor, [{ addr, lastSeen: unixTimestamp() }])
    } else {
      this.container.move(addr, HostColor.Gold, unixTimestamp())
    }
    this.updateSizes()
  }

  /**
   * An outbound connection failed: gold and white hosts drop to grey, grey
   * hosts are evicted, anchors stay.
   */
  demote(addr: Address): void {
    const color = this.container.getColor(addr)
    if (color === HostColor.Gold || color === HostColor.White) {
      this.container.promote(addr, color, HostColor.Grey)
    } else if (color === HostColor.Grey) {
      this.container.evict(addr, HostColor.Grey)
    }
    this.updateSizes()
  }

  ban(addr: Address): void {
    this.container.move(addr, HostColor.Black, unixTimestamp())
    this.metrics?.peerBans.inc()
    this.updateSizes()
    log('banned %s', addr)
  }

  updateSizes(): void {
    if (this.metrics === undefined) return
    for (const color of HOST_COLORS) {
      this.metrics.hostlistSize.set({ tier: colorName(color) }, this.container.size(color))
    }
  }

  private preferredColors(slot: number): HostColor[] {
    if (slot < this.settings.goldConnectCount) return [HostColor.Anchor, HostColor.Gold]
    return Math.random() * 100 < this.settings.whiteConnectPercent
      ? [HostColor.White]
      : [HostColor.Grey]
  }

  private isCandidate(addr: Address): boolean {
    return !(
      this.isBlocked(addr) ||
      this.isConnected(addr) ||
      this.pending.has(addr) ||
      this.migrating.has(addr) ||
      this.settings.peers.includes(addr) ||
      this.isSelf(addr)
    )
  }
}
