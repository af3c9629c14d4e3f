import debug from 'debug'
import { shuffle } from 'radash'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { hashToId, sortByDistance } from '@meshwork/kademlia'
import { type Address, schemeOf, tryNormalizeAddress } from '../address'

const log = debug('meshwork:hosts:container')

export enum HostColor {
  /** Discovered, never verified */
  Grey = 0,
  /** Answered a refinery probe */
  White = 1,
  /** Completed an outbound connection */
  Gold = 2,
  /** Preferred for the first outbound slots, never demoted */
  Anchor = 3,
  /** Never dialed or accepted */
  Black = 4,
}

export const HOST_COLORS = [
  HostColor.Grey,
  HostColor.White,
  HostColor.Gold,
  HostColor.Anchor,
  HostColor.Black,
] as const

const COLOR_NAMES: Record<HostColor, string> = {
  [HostColor.Grey]: 'grey',
  [HostColor.White]: 'white',
  [HostColor.Gold]: 'gold',
  [HostColor.Anchor]: 'anchor',
  [HostColor.Black]: 'black',
}

export const colorName = (color: HostColor): string => COLOR_NAMES[color]

export function parseColor(name: string): HostColor | undefined {
  return HOST_COLORS.find((color) => COLOR_NAMES[color] === name)
}

export const TIER_LIMITS: Record<HostColor, number> = {
  [HostColor.Grey]: 2000,
  [HostColor.White]: 5000,
  [HostColor.Gold]: 1000,
  [HostColor.Anchor]: Number.POSITIVE_INFINITY,
  [HostColor.Black]: Number.POSITIVE_INFINITY,
}

export interface HostEntry {
  addr: Address
  /** UNIX seconds */
  lastSeen: number
}

export interface FetchedEntry {
  entry: HostEntry
  /** Index of the entry in its tier when fetched */
  position: number
}

/**
 * The five host tiers. An address lives in at most one tier; every method
 * completes its mutation synchronously.
 */
export class HostContainer {
  private readonly tiers: HostEntry[][] = HOST_COLORS.map(() => [])
  private readonly colors = new Map<Address, HostColor>()

  /**
   * Inserts new entries into `color` and refreshes `lastSeen` of entries
   * already there. Addresses held by another tier are skipped. Returns the
   * number of entries inserted or refreshed.
   */
  storeOrUpdate(color: HostColor, entries: readonly HostEntry[]): number {
    const tier = this.tiers[color]
    let changed = 0
    for (const { addr, lastSeen } of entries) {
      const current = this.colors.get(addr)
      if (current === undefined) {
        tier.push({ addr, lastSeen })
        this.colors.set(addr, color)
        changed++
      } else if (current === color) {
        const existing = tier.find((e) => e.addr === addr)
        if (existing !== undefined && lastSeen > existing.lastSeen) {
          existing.lastSeen = lastSeen
          changed++
        }
      }
    }
    if (changed > 0) this.resort(color)
    return changed
  }

  /**
   * Moves `addr` from `from` to `to`, keeping its `lastSeen` unless one is
   * given. No-op unless the address is currently in `from`.
   */
  promote(addr: Address, from: HostColor, to: HostColor, lastSeen?: number): boolean {
    if (this.colors.get(addr) !== from) return false
    const entry = this.take(from, addr)
    if (entry === undefined) return false
    this.insert(to, { addr, lastSeen: lastSeen ?? entry.lastSeen })
    return true
  }

  /** Puts `addr` into `to`, out of whichever tier held it. */
  move(addr: Address, to: HostColor, lastSeen: number): void {
    const current = this.colors.get(addr)
    if (current !== undefined) this.take(current, addr)
    this.insert(to, { addr, lastSeen })
  }

  evict(addr: Address, color: HostColor): boolean {
    if (this.colors.get(addr) !== color) return false
    return this.take(color, addr) !== undefined
  }

  /**
   * Removes `addr` from `color`, trying `position` first. Entries shift as
   * tiers change, so a stale position falls back to a lookup.
   */
  removeAt(color: HostColor, addr: Address, position: number): boolean {
    if (this.colors.get(addr) !== color) return false
    const tier = this.tiers[color]
    const index = tier[position]?.addr === addr ? position : tier.findIndex((e) => e.addr === addr)
    if (index === -1) return false
    tier.splice(index, 1)
    this.colors.delete(addr)
    return true
  }

  contains(addr: Address): boolean {
    return this.colors.has(addr)
  }

  containsIn(color: HostColor, addr: Address): boolean {
    return this.colors.get(addr) === color
  }

  getColor(addr: Address): HostColor | undefined {
    return this.colors.get(addr)
  }

  getEntry(addr: Address): HostEntry | undefined {
    const color = this.colors.get(addr)
    if (color === undefined) return undefined
    const entry = this.tiers[color].find((e) => e.addr === addr)
    return entry === undefined ? undefined : { ...entry }
  }

  isEmpty(color: HostColor): boolean {
    return this.tiers[color].length === 0
  }

  size(color: HostColor): number {
    return this.tiers[color].length
  }

  /** Copy of the tier, newest first */
  fetchAll(color: HostColor): HostEntry[] {
    return this.tiers[color].map((e) => ({ ...e }))
  }

  fetchWithSchemes(color: HostColor, schemes: readonly string[], limit?: number): HostEntry[] {
    const matching = this.tiers[color]
      .filter((e) => schemes.includes(schemeOf(e.addr)))
      .map((e) => ({ ...e }))
    return limit === undefined ? matching : matching.slice(0, limit)
  }

  fetchRandom(color: HostColor, schemes: readonly string[]): FetchedEntry | undefined {
    const positions: number[] = []
    this.tiers[color].forEach((e, i) => {
      if (schemes.includes(schemeOf(e.addr))) positions.push(i)
    })
    if (positions.length === 0) return undefined
    const position = positions[Math.floor(Math.random() * positions.length)]
    return { entry: { ...this.tiers[color][position] }, position }
  }

  fetchRandomN(color: HostColor, schemes: readonly string[], n: number): HostEntry[] {
    return shuffle(this.fetchWithSchemes(color, schemes)).slice(0, n)
  }

  /**
   * The `n` non-black addresses closest to `key` by XOR distance of their
   * hashed address.
   */
  findNeighbors(key: Uint8Array, n: number): Address[] {
    const addrs = HOST_COLORS.filter((c) => c !== HostColor.Black).flatMap((c) =>
      this.tiers[c].map((e) => e.addr),
    )
    return sortByDistance(key, addrs, hashToId).slice(0, n)
  }

  /**
   * Loads entries saved by `save`. A missing file loads nothing; malformed
   * lines are skipped.
   */
  async load(path: string): Promise<number> {
    let text: string
    try {
      text = await readFile(path, 'utf8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        log('no host file at %s', path)
        return 0
      }
      throw err
    }

    const byColor = new Map<HostColor, HostEntry[]>()
    let loaded = 0
    for (const [lineNo, line] of text.split('\n').entries()) {
      if (line.trim() === '') continue
      const entry = parseLine(line)
      if (entry === undefined) {
        log('skipping malformed host file line %d', lineNo + 1)
        continue
      }
      const list = byColor.get(entry.color) ?? []
      list.push({ addr: entry.addr, lastSeen: entry.lastSeen })
      byColor.set(entry.color, list)
      loaded++
    }
    for (const [color, entries] of byColor) this.storeOrUpdate(color, entries)
    log('loaded %d hosts from %s', loaded, path)
    return loaded
  }

  /** Writes every tier to `path` through a temporary file and a rename. */
  async save(path: string): Promise<void> {
    const lines = HOST_COLORS.flatMap((color) =>
      this.tiers[color].map((e) => `${colorName(color)}\t${e.addr}\t${e.lastSeen}\n`),
    )
    const tmp = `${path}.${process.pid}.tmp`
    await mkdir(dirname(path), { recursive: true })
    await writeFile(tmp, lines.join(''), 'utf8')
    await rename(tmp, path)
    log('saved %d hosts to %s', lines.length, path)
  }

  private insert(color: HostColor, entry: HostEntry): void {
    this.tiers[color].push(entry)
    this.colors.set(entry.addr, color)
    this.resort(color)
  }

  private take(color: HostColor, addr: Address): HostEntry | undefined {
    const tier = this.tiers[color]
    const index = tier.findIndex((e) => e.addr === addr)
    if (index === -1) return undefined
    const [entry] = tier.splice(index, 1)
    this.colors.delete(addr)
    return entry
  }

  // newest first, oldest dropped past the limit
  private resort(color: HostColor): void {
    const tier = this.tiers[color]
    tier.sort((a, b) => b.lastSeen - a.lastSeen)
    const limit = TIER_LIMITS[color]
    if (tier.length <= limit) return
    for (const dropped of tier.splice(limit)) this.colors.delete(dropped.addr)
  }
}

function parseLine(line: string): (HostEntry & { color: HostColor }) | undefined {
  const fields = line.split('\t')
  if (fields.length !== 3) return undefined
  const [tierName, rawAddr, rawLastSeen] = fields
  const color = parseColor(tierName)
  const addr = tryNormalizeAddress(rawAddr)
  const lastSeen = Number(rawLastSeen)
  if (color === undefined || addr === undefined) return undefined
  if (!Number.isSafeInteger(lastSeen) || lastSeen < 0) return undefined
  return { addr, lastSeen, color }
}
