import debug from 'debug'
import { raceSignal } from 'race-signal'
import { type Address, dialableSchemes } from '../address'
import type { Channel } from '../channel/channel'
import { Connector } from '../connector'
import type { SlotState } from '../dnet'
import { GetAddrsCodec } from '../message/messages'
import { GETADDRS_REQUEST_MAX } from '../protocol/protocol-address'
import { StoppableTask } from '../system/stoppable-task'
import { sleep } from '../system/time'
import type { P2pHandle } from '../types'
import { SESSION_OUTBOUND } from './flags'
import { Session } from './session'

const log = debug('meshwork:session:outbound')

export interface SlotInfo {
  index: number
  state: SlotState
  address?: Address
  channelId?: number
}

class Slot {
  state: SlotState = 'dead'
  address?: Address
  channel?: Channel
  readonly task: StoppableTask

  constructor(readonly index: number) {
    this.task = new StoppableTask(`outbound slot ${index}`)
  }
}

/**
 * `outboundConnections` slots, each keeping one outbound channel alive.
 * A slot with no candidate triggers peer discovery and waits.
 */
export class OutboundSession extends Session {
  override readonly type = SESSION_OUTBOUND
  private readonly connector: Connector
  private readonly slots: Slot[] = []
  private lastDiscovery = Number.NEGATIVE_INFINITY

  constructor(p2p: P2pHandle) {
    super(p2p)
    this.connector = new Connector(p2p, SESSION_OUTBOUND)
  }

  override async start(): Promise<void> {
    const count = this.p2p.settings.outboundConnections
    this.p2p.logger.info(`starting ${count} outbound slot(s)`)
    for (let i = 0; i < count; i++) {
      const slot = new Slot(i)
      this.slots.push(slot)
      slot.task.start((signal) => this.runSlot(slot, signal))
    }
  }

  override async stop(): Promise<void> {
    await Promise.all(this.slots.map((slot) => slot.task.stop()))
  }

  slotInfo(): SlotInfo[] {
    return this.slots.map((slot) => ({
      index: slot.index,
      state: slot.state,
      address: slot.address,
      channelId: slot.channel?.id,
    }))
  }

  private async runSlot(slot: Slot, signal: AbortSignal): Promise<void> {
    const hosts = this.p2p.hosts
    const { outboundPeerDiscoveryAttemptTime } = this.p2p.settings

    while (!signal.aborted) {
      this.setState(slot, 'dead')
      const addr = hosts.selectOutbound(slot.index)
      if (addr === undefined) {
        log('slot %d: no candidate', slot.index)
        await this.discoverPeers()
        await sleep(outboundPeerDiscoveryAttemptTime, signal)
        continue
      }

      this.setState(slot, 'connecting', addr)
      let channel: Channel
      try {
        channel = await this.connector.connect(addr, signal)
        await this.registerChannel(channel)
      } catch (err) {
        if (signal.aborted) return
        const message = err instanceof Error ? err.message : String(err)
        log('slot %d: %s failed: %s', slot.index, addr, message)
        hosts.demote(addr)
        continue
      } finally {
        hosts.release(addr)
      }

      hosts.markConnected(addr)
      this.setState(slot, 'connected', addr, channel)
      this.p2p.logger.info(`slot ${slot.index} connected to ${addr}`)
      try {
        await raceSignal(channel.closed, signal)
        log('slot %d: %s disconnected', slot.index, addr)
      } finally {
        if (signal.aborted) await channel.stop()
      }
    }
  }

  /**
   * Asks connected peers for addresses, or reseeds when there are none. At
   * most once per `outboundPeerDiscoveryCooloffTime`.
   */
  private async discoverPeers(): Promise<void> {
    const { settings, hosts } = this.p2p
    const now = Date.now()
    if (now - this.lastDiscovery < settings.outboundPeerDiscoveryCooloffTime) return
    this.lastDiscovery = now

    if (hosts.channelList().length > 0) {
      log('discovery: asking connected peers for addresses')
      await this.p2p.broadcast(GetAddrsCodec, {
        max: GETADDRS_REQUEST_MAX,
        transports: dialableSchemes(settings.allowedTransports, settings.transportMixing),
      })
    } else if (settings.seeds.length > 0) {
      log('discovery: no channels, reseeding')
      await this.p2p.reseed()
    }
  }

  private setState(slot: Slot, state: SlotState, address?: Address, channel?: Channel): void {
    slot.state = state
    slot.address = address
    slot.channel = channel
    const dnet = this.p2p.dnet
    if (dnet.enabled) {
      dnet.emit('outbound:slot', { slot: slot.index, state, address, channelId: channel?.id })
    }
  }
}
