import debug from 'debug'
import type { Channel } from '../channel/channel'
import { ChannelStoppedError } from '../errors'

const log = debug('meshwork:protocol:jobs')

export type ProtocolJob = (signal: AbortSignal) => Promise<void>

/**
 * Owns a protocol's background loops and cancels them all when the channel
 * stops.
 */
export class ProtocolJobsManager {
  private readonly controller = new AbortController()
  private readonly jobs = new Set<Promise<void>>()

  constructor(
    private readonly name: string,
    private readonly channel: Channel,
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal
  }

  start(): void {
    if (this.channel.isStopped) {
      this.controller.abort()
      return
    }
    const sub = this.channel.subscribeStop()
    this.spawn(async (signal) => {
      try {
        await sub.receive(signal)
      } finally {
        this.controller.abort()
      }
    })
  }

  spawn(job: ProtocolJob): void {
    if (this.controller.signal.aborted) return
    const signal = this.controller.signal
    const running: Promise<void> = job(signal)
      .catch((err: unknown) => {
        if (signal.aborted || err instanceof ChannelStoppedError) return
        const message = err instanceof Error ? err.message : String(err)
        log('%s job on %s failed: %s', this.name, this.channel.address, message)
      })
      .finally(() => this.jobs.delete(running))
    this.jobs.add(running)
  }
}
