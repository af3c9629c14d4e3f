import debug from 'debug'
import type { MessageCodec } from '../message/codec'
import { Subscription } from '../system/subscriber'

const log = debug('meshwork:channel:messages')

type Deliver = (payload: Uint8Array) => void

/**
 * Per-channel routing of incoming packets to typed subscriptions, keyed by
 * command. Each subscription decodes with the codec it subscribed with.
 */
export class MessageSubsystem {
  private readonly handlers = new Map<string, Map<number, Deliver>>()
  private readonly subscriptions = new Set<Subscription<unknown>>()
  private closedWith?: Error
  private nextId = 0

  subscribe<T>(codec: MessageCodec<T>): Subscription<T> {
    const id = this.nextId++
    const sub = new Subscription<T>(id, () => {
      this.handlers.get(codec.name)?.delete(id)
      this.subscriptions.delete(sub)
    })
    if (this.closedWith !== undefined) {
      sub.close(this.closedWith)
      return sub
    }

    let byId = this.handlers.get(codec.name)
    if (byId === undefined) {
      byId = new Map()
      this.handlers.set(codec.name, byId)
    }
    byId.set(id, (payload) => sub.push(codec.decode(payload)))
    this.subscriptions.add(sub)
    return sub
  }

  /**
   * Delivers `payload` to every subscriber of `command`. Returns false when
   * nobody listens. A payload the codec rejects throws its `ProtocolError`.
   */
  notify(command: string, payload: Uint8Array): boolean {
    const byId = this.handlers.get(command)
    if (byId === undefined || byId.size === 0) {
      log('no subscribers for %s, dropped', command)
      return false
    }
    for (const deliver of byId.values()) deliver(payload)
    return true
  }

  close(err: Error): void {
    if (this.closedWith !== undefined) return
    this.closedWith = err
    for (const sub of this.subscriptions) sub.close(err)
    this.subscriptions.clear()
    this.handlers.clear()
  }
}
