import debug from 'debug'
import { EventEmitter } from 'eventemitter3'
import type { Duplex } from 'node:stream'
import { randomU32, toError } from '@meshwork/utils'
import type { NetworkMetrics } from '@meshwork/metrics'
import type { Address } from '../address'
import type { Dnet } from '../dnet'
import { ChannelStoppedError, ErrorCode, ProtocolError } from '../errors'
import type { MessageCodec } from '../message/codec'
import type { VersionMessage } from '../message/messages'
import { encodePacket, readPacket } from '../message/packet'
import type { BanPolicy } from '../settings'
import { sessionName, type SessionFlag } from '../session/flags'
import { StoppableTask } from '../system/stoppable-task'
import { Subscriber, type Subscription } from '../system/subscriber'
import { StreamReader, writeAll } from '../transport/stream-reader'
import { MessageSubsystem } from './message-subsystem'

const log = debug('meshwork:channel')

/** Entries kept in a channel's debug message log */
export const DNET_LOG_SIZE = 512

export type ChannelDirection = 'inbound' | 'outbound'

export interface ChannelInit {
  stream: Duplex
  /** Address the channel was dialed at, or the remote end of an accepted one */
  address: Address
  direction: ChannelDirection
  sessionFlag: SessionFlag
  banPolicy?: BanPolicy
  /** Called when a misbehaving peer is banned under the strict policy */
  onBan?: (channel: Channel, reason: string) => void
  dnet?: Dnet
  metrics?: NetworkMetrics
}

export interface ChannelEvents {
  stopped: (reason: Error) => void
}

export interface MessageLogEntry {
  time: number
  direction: 'send' | 'recv'
  command: string
  size: number
}

export interface ChannelInfo {
  id: number
  address: Address
  direction: ChannelDirection
  session: string
  remoteNodeId?: string
  remoteAppVersion?: string
  startedAt: number
  stopped: boolean
}

/**
 * A framed, bidirectional message pipe to one peer. Incoming packets are
 * routed by command to typed subscriptions; `stop()` closes the stream and
 * rejects every pending receive.
 */
export class Channel extends EventEmitter<ChannelEvents> {
  readonly id = randomU32()
  readonly address: Address
  readonly direction: ChannelDirection
  readonly sessionFlag: SessionFlag
  readonly startedAt = Date.now()
  /** Resolves with the stop reason once the channel has stopped */
  readonly closed: Promise<Error>

  private readonly stream: Duplex
  private readonly reader: StreamReader
  private readonly messages = new MessageSubsystem()
  private readonly stopSubscriber = new Subscriber<Error>()
  private readonly receiveTask = new StoppableTask('channel-receive')
  private readonly messageLog: MessageLogEntry[] = []
  private resolveClosed: (reason: Error) => void = () => {}
  private stopReason?: Error
  private remote?: VersionMessage

  constructor(private readonly init: ChannelInit) {
    super()
    this.stream = init.stream
    this.address = init.address
    this.direction = init.direction
    this.sessionFlag = init.sessionFlag
    this.reader = new StreamReader(init.stream)
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve
    })
    this.stream.on('error', (err) => log('%s stream error: %s', this.address, err.message))

    const dnet = init.dnet
    if (dnet?.enabled === true) {
      dnet.emit('channel:created', {
        channelId: this.id,
        address: this.address,
        session: sessionName(this.sessionFlag),
      })
    }
  }

  get isStopped(): boolean {
    return this.stopReason !== undefined
  }

  get remoteVersion(): VersionMessage | undefined {
    return this.remote
  }

  /** @internal set by the version handshake */
  setRemoteVersion(version: VersionMessage): void {
    this.remote = version
  }

  /**
   * Starts routing incoming packets. Subscribe to the first expected
   * messages before calling this, or they may be dropped.
   */
  start(): void {
    if (this.isStopped) throw new ChannelStoppedError(this.address)
    this.receiveTask.start(
      (signal) => this.receiveLoop(signal),
      async (err) => {
        if (err !== undefined) await this.stop(err)
      },
    )
  }

  async send<T>(codec: MessageCodec<T>, message: T): Promise<void> {
    if (this.stopReason !== undefined) {
      throw new ChannelStoppedError(this.address, this.stopReason)
    }
    const payload = codec.encode(message)
    const packet = encodePacket({ command: codec.name, payload })
    try {
      await writeAll(this.stream, packet)
    } catch (err) {
      await this.stop(toError(err))
      throw new ChannelStoppedError(this.address, err)
    }
    this.init.metrics?.bytesSent.inc(payload.length)
    this.record('send', codec.name, payload.length)
  }

  subscribeMsg<T>(codec: MessageCodec<T>): Subscription<T> {
    return this.messages.subscribe(codec)
  }

  /**
   * Subscription that receives the stop reason. Throws if the channel has
   * already stopped.
   */
  subscribeStop(): Subscription<Error> {
    if (this.stopReason !== undefined) {
      throw new ChannelStoppedError(this.address, this.stopReason)
    }
    return this.stopSubscriber.subscribe()
  }

  /**
   * Closes the stream and fails every pending receive. Idempotent; the
   * first reason wins.
   */
  async stop(reason: Error = new ChannelStoppedError(this.address)): Promise<void> {
    if (this.stopReason !== undefined) return
    this.stopReason = reason
    log('stopping channel %s: %s', this.address, reason.message)

    this.stream.destroy()
    const stopped =
      reason instanceof ChannelStoppedError ? reason : new ChannelStoppedError(this.address, reason)
    this.messages.close(stopped)
    this.stopSubscriber.notify(reason)
    this.stopSubscriber.close(stopped)
    this.resolveClosed(reason)
    this.emit('stopped', reason)

    const dnet = this.init.dnet
    if (dnet?.enabled === true) {
      dnet.emit('channel:stopped', {
        channelId: this.id,
        address: this.address,
        reason: reason.message,
      })
    }
    await this.receiveTask.stop()
  }

  /**
   * Reports a misbehaving peer. Under the strict policy the peer is banned
   * and the channel stops; under the relaxed policy it is only logged.
   */
  async ban(reason: string): Promise<void> {
    if ((this.init.banPolicy ?? 'strict') === 'relaxed') {
      log('peer %s misbehaved (not banned): %s', this.address, reason)
      return
    }
    log('banning peer %s: %s', this.address, reason)
    this.init.onBan?.(this, reason)
    await this.stop(new ProtocolError(`banned: ${reason}`, {
      code: ErrorCode.MALFORMED_MESSAGE,
      context: { address: this.address },
    }))
  }

  info(): ChannelInfo {
    return {
      id: this.id,
      address: this.address,
      direction: this.direction,
      session: sessionName(this.sessionFlag),
      remoteNodeId: this.remote?.nodeId,
      remoteAppVersion: this.remote?.appVersion,
      startedAt: this.startedAt,
      stopped: this.isStopped,
    }
  }

  /** Recent traffic, recorded only while dnet is enabled */
  messageHistory(): MessageLogEntry[] {
    return [...this.messageLog]
  }

  // Ends on EOF or a malformed packet; the task stop handler stops the channel.
  private async receiveLoop(signal: AbortSignal): Promise<void> {
    for (;;) {
      const packet = await readPacket(this.reader, signal)
      this.init.metrics?.bytesReceived.inc(packet.payload.length)
      this.record('recv', packet.command, packet.payload.length)
      this.messages.notify(packet.command, packet.payload)
    }
  }

  private record(direction: 'send' | 'recv', command: string, size: number): void {
    const dnet = this.init.dnet
    if (dnet?.enabled !== true) return

    this.messageLog.push({ time: Date.now(), direction, command, size })
    if (this.messageLog.length > DNET_LOG_SIZE) this.messageLog.shift()
    const event = { channelId: this.id, address: this.address, command, size }
    if (direction === 'send') dnet.emit('channel:send', event)
    else dnet.emit('channel:recv', event)
  }
}
