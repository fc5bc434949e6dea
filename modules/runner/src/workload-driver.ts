import { setMaxListeners } from 'events'

import { Client, completionOf, invokeWithTimeout } from 'client-protocol'
import { Outcome } from 'core-types'
import { Logger } from 'logger'
import { aTimeoutOf, TypedPublisher } from 'misc'
import { Lane } from 'op-generator'
import { HistoryRecorder } from 'run-store'

import { RunEvents } from './run-events'

export interface WorkloadContext {
  lanes: readonly Lane[]
  /**
   * One open client per lane, in lane order.
   */
  clients: readonly Client[]
  recorder: HistoryRecorder
  /**
   * Nanoseconds since the start of the run.
   */
  clock: () => number
  invokeTimeoutMs: number
  /**
   * Stops the lanes from starting new invocations. In-flight invocations complete (or time out) and are recorded.
   */
  signal: AbortSignal
  logger: Logger
  publisher?: TypedPublisher<RunEvents>
}

export type WorkloadSummary = Record<Outcome, number>

/**
 * Drives every lane concurrently. A lane issues its invocations one at a time: it waits for the staggered delay,
 * invokes its client, and records the completed operation. After an `info` outcome the lane continues under a fresh
 * process id (its id plus the number of lanes), since the previous invocation may still be in flight. If a lane fails
 * the other lanes stop too, and the first failure is rethrown once all of them have stopped.
 */
export async function runWorkload(ctx: WorkloadContext): Promise<WorkloadSummary> {
  const { lanes, clients, logger } = ctx
  if (lanes.length !== clients.length) {
    throw new Error(`got ${clients.length} clients for ${lanes.length} lanes`)
  }
  const summary: WorkloadSummary = { ok: 0, fail: 0, info: 0 }

  // stops every lane when the caller aborts or when one lane fails
  const stopper = new AbortController()
  const signal = stopper.signal
  setMaxListeners(0, signal)
  const stop = () => stopper.abort()
  if (ctx.signal.aborted) {
    stop()
  } else {
    ctx.signal.addEventListener('abort', stop, { once: true })
  }

  const runLane = async (lane: Lane, client: Client) => {
    let processId = lane.id
    for (let next = lane.source.next(); next !== undefined; next = lane.source.next()) {
      await aTimeoutOf(next.delayMs, signal).hasPassed()
      if (signal.aborted) {
        break
      }
      const invocation = next.item
      const invokeTime = ctx.clock()
      const result = await invokeWithTimeout(client, invocation, ctx.invokeTimeoutMs, logger)
      const completeTime = ctx.clock()
      const completion = completionOf(invocation, result)
      const op = await ctx.recorder.append({ process: processId, invokeTime, completeTime, ...completion })
      ++summary[op.outcome]
      await ctx.publisher?.publish('operationRecorded', op)
      if (result.outcome === 'info') {
        processId += lanes.length
      }
    }
    logger.info(`lane ${lane.id} is done (last process id: ${processId})`)
  }

  const settled = await Promise.allSettled(
    lanes.map((lane, i) =>
      runLane(lane, clients[i]).catch((e: unknown) => {
        stop()
        throw e
      }),
    ),
  )
  ctx.signal.removeEventListener('abort', stop)
  for (const s of settled) {
    if (s.status === 'rejected') {
      throw s.reason
    }
  }
  return summary
}
