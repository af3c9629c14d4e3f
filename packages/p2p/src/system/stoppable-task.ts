import { AlreadyStartedError } from '@libp2p/interface'
import debug from 'debug'

const log = debug('meshwork:system:task')

export type TaskMain = (signal: AbortSignal) => Promise<void>

/**
 * Called once when the task exits. `err` is undefined for a clean return or
 * an exit caused by `stop()`.
 */
export type TaskStopHandler = (err: Error | undefined) => void | Promise<void>

/**
 * A long-running loop that can be stopped from outside. The loop receives an
 * AbortSignal and must pass it to every wait so `stop()` unblocks it.
 */
export class StoppableTask {
  private controller?: AbortController
  private running?: Promise<void>

  constructor(public readonly name = 'task') {}

  get isRunning(): boolean {
    return this.running !== undefined
  }

  start(main: TaskMain, onStop?: TaskStopHandler): void {
    if (this.running !== undefined) {
      throw new AlreadyStartedError(`${this.name} already running`)
    }
    const controller = new AbortController()
    this.controller = controller
    this.running = this.run(main, controller, onStop)
  }

  /**
   * Aborts the loop and waits for it to exit. Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    const { controller, running } = this
    if (controller === undefined || running === undefined) return
    controller.abort()
    await running
  }

  private async run(
    main: TaskMain,
    controller: AbortController,
    onStop?: TaskStopHandler,
  ): Promise<void> {
    let failure: Error | undefined
    try {
      await main(controller.signal)
    } catch (err) {
      if (!controller.signal.aborted) {
        failure = err instanceof Error ? err : new Error(String(err))
        log('%s failed: %s', this.name, failure.message)
      }
    }

    if (this.controller === controller) {
      this.controller = undefined
      this.running = undefined
    }

    try {
      await onStop?.(failure)
    } catch (err) {
      log('%s stop handler failed: %s', this.name, err instanceof Error ? err.message : String(err))
    }
  }
}
