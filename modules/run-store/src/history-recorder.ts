import { History, Operation } from 'core-types'
import * as fse from 'fs-extra'
import { Logger } from 'logger'
import PQueue from 'p-queue'

type Unindexed<T> = T extends unknown ? Omit<T, 'index'> : never

/**
 * An operation that was not yet given its position in the history.
 */
export type PendingOperation = Unindexed<Operation>

/**
 * Collects the operations of a run. Appends from concurrent workers are funneled through a single-writer queue: each
 * operation gets the next index (0, 1, 2, ...) in the order in which `append()` was called and, when the recorder has
 * a file, is written to it as a single JSON line before the next one is handled.
 */
export class HistoryRecorder {
  private readonly queue = new PQueue({ concurrency: 1 })
  private readonly ops: Operation[] = []
  private closed = false

  constructor(private readonly logger: Logger, private readonly file?: string) {}

  append(pending: PendingOperation): Promise<Operation> {
    if (this.closed) {
      return Promise.reject(new Error('cannot append to a closed history'))
    }
    return this.queue.add(async () => {
      const op: Operation = { ...pending, index: this.ops.length }
      if (this.file) {
        await fse.appendFile(this.file, JSON.stringify(op) + '\n')
      }
      this.ops.push(op)
      return op
    })
  }

  get size() {
    return this.ops.length
  }

  /**
   * Waits for the pending appends and returns the complete history. No further appends are accepted.
   */
  async close(): Promise<History> {
    this.closed = true
    await this.queue.onIdle()
    this.logger.info(`history closed with ${this.ops.length} operations`)
    return Object.freeze([...this.ops])
  }
}
