import { type Pushable, pushable } from 'it-pushable'
import { raceSignal } from 'race-signal'

export class SubscriptionClosedError extends Error {
  constructor() {
    super('subscription closed')
    this.name = 'SubscriptionClosedError'
  }
}

/**
 * One consumer's queue on a `Subscriber`. Values arrive in publish order.
 */
export class Subscription<T> {
  private readonly queue: Pushable<T>
  private closedWith?: Error

  constructor(
    public readonly id: number,
    private readonly onUnsubscribe: (id: number) => void,
  ) {
    this.queue = pushable<T>({ objectMode: true })
  }

  /**
   * Next value. Rejects with the error the subscriber was closed with, or
   * with the abort of `signal`. A value arriving after an abort is still
   * consumed by the aborted read.
   */
  async receive(signal?: AbortSignal): Promise<T> {
    if (this.closedWith !== undefined && this.queue.readableLength === 0) {
      throw this.closedWith
    }
    const next = this.queue.next()
    const result = signal === undefined ? await next : await raceSignal(next, signal)
    if (result.done === true) throw this.closedWith ?? new SubscriptionClosedError()
    return result.value
  }

  unsubscribe(): void {
    this.close(new SubscriptionClosedError())
    this.onUnsubscribe(this.id)
  }

  /** @internal */
  push(value: T): void {
    if (this.closedWith === undefined) this.queue.push(value)
  }

  /** @internal */
  close(err: Error): void {
    if (this.closedWith !== undefined) return
    this.closedWith = err
    this.queue.end()
  }
}

/**
 * Fan-out of values to any number of `Subscription`s.
 */
export class Subscriber<T> {
  private readonly subs = new Map<number, Subscription<T>>()
  private nextId = 0

  subscribe(): Subscription<T> {
    const sub = new Subscription<T>(this.nextId++, (id) => this.subs.delete(id))
    this.subs.set(sub.id, sub)
    return sub
  }

  notify(value: T): void {
    for (const sub of this.subs.values()) sub.push(value)
  }

  /**
   * Ends every subscription; pending and later `receive()` calls reject with
   * `err` once queued values are drained.
   */
  close(err: Error): void {
    for (const sub of this.subs.values()) sub.close(err)
    this.subs.clear()
  }

  get size(): number {
    return this.subs.size
  }
}
