import debug from 'debug'
import type { Address } from '../address'
import { Connector } from '../connector'
import type { P2pHandle } from '../types'
import { SESSION_SEED } from './flags'
import { Session } from './session'

const log = debug('meshwork:session:seed')

/**
 * Bootstraps the greylist: dials every seed once, in parallel, runs the
 * seed protocol on each and disconnects.
 */
export class SeedSession extends Session {
  override readonly type = SESSION_SEED
  private readonly connector: Connector
  private running?: Promise<void>

  constructor(p2p: P2pHandle) {
    super(p2p)
    this.connector = new Connector(p2p, SESSION_SEED)
  }

  /** Queries every seed. Concurrent calls share the run in progress. */
  override start(): Promise<void> {
    this.running ??= this.querySeeds().finally(() => {
      this.running = undefined
    })
    return this.running
  }

  override async stop(): Promise<void> {
    await this.running
  }

  private async querySeeds(): Promise<void> {
    const { seeds } = this.p2p.settings
    if (seeds.length === 0) {
      this.p2p.logger.warn('no seeds configured, skipping seed session')
      return
    }

    this.p2p.logger.info(`querying ${seeds.length} seed(s)`)
    const results = await Promise.allSettled(seeds.map((seed) => this.querySeed(seed)))
    const ok = results.filter((r) => r.status === 'fulfilled').length
    if (ok === 0) {
      this.p2p.logger.warn('no seed answered, the greylist may stay empty')
    } else {
      this.p2p.logger.info(`${ok} of ${seeds.length} seed(s) answered`)
    }
  }

  private async querySeed(seed: Address): Promise<void> {
    try {
      const channel = await this.connector.connect(seed)
      try {
        await this.registerChannel(channel)
      } finally {
        await channel.stop()
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      log('seed %s failed: %s', seed, message)
      this.p2p.logger.debug(`seed ${seed} failed: ${message}`)
      throw err
    }
  }
}
