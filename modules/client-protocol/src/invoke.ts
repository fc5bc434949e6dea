import { Invocation } from 'core-types'
import { Logger } from 'logger'
import { raceWithTimeout } from 'misc'

import { Client, InvokeResult } from './client'
import { thrownOutcome, timeoutOutcome } from './outcomes'

/**
 * Invokes `client` and waits at most `timeoutMs` for the result. There are no retries. An invocation that is still in
 * flight when the time runs out is left running; if it later rejects, the rejection is logged.
 */
export async function invokeWithTimeout(
  client: Client,
  invocation: Invocation,
  timeoutMs: number,
  logger: Logger,
): Promise<InvokeResult> {
  try {
    const raced = await raceWithTimeout(client.invoke(invocation), timeoutMs, e =>
      logger.warn(`late rejection of a timed-out ${invocation.f} on key ${invocation.key}`, e),
    )
    if (!raced.settled) {
      return timeoutOutcome(invocation.f)
    }
    return raced.value
  } catch (e) {
    logger.warn(`client threw on ${invocation.f} on key ${invocation.key}`, e)
    return thrownOutcome(invocation.f, e)
  }
}
