import { FaultFunction } from 'core-types'
import { Logger } from 'logger'
import { aTimeoutOf, errorLike } from 'misc'

import { FaultInjector } from './fault-injector'
import { NemesisStep } from './schedule'

export interface NemesisEvent {
  f: FaultFunction
  /**
   * The injector's description of the fault, or null if the injector failed.
   */
  value: string | null
  invokeTime: number
  completeTime: number
  error?: string
}

export interface NemesisOptions {
  timeUnitMs: number
  /**
   * Ends the timeline early. An active fault is healed before `runNemesis()` returns.
   */
  signal: AbortSignal
  record: (event: NemesisEvent) => Promise<void>
  /**
   * Nanoseconds since the start of the run.
   */
  clock: () => number
  logger: Logger
}

export interface NemesisSummary {
  started: number
  stopped: number
  healedAtEnd: boolean
}

/**
 * Executes a nemesis schedule against an injector. Injector failures are recorded (as nemesis operations with an
 * `error`) and logged but do not end the timeline.
 */
export async function runNemesis(
  schedule: readonly NemesisStep[],
  injector: FaultInjector,
  options: NemesisOptions,
): Promise<NemesisSummary> {
  const { signal, logger } = options
  const summary: NemesisSummary = { started: 0, stopped: 0, healedAtEnd: false }
  let active = false

  const trigger = async (f: FaultFunction) => {
    const invokeTime = options.clock()
    try {
      const value = f === 'fault_start' ? await injector.start() : await injector.stop()
      await options.record({ f, value, invokeTime, completeTime: options.clock() })
      logger.print(`${f}: ${value}`, 'low')
      return true
    } catch (e) {
      const message = errorLike(e).message ?? String(e)
      logger.error(`${f} failed`, e)
      await options.record({ f, value: null, invokeTime, completeTime: options.clock(), error: message })
      return false
    }
  }

  for (const step of schedule) {
    if (signal.aborted) {
      break
    }
    if (step.kind === 'sleep') {
      await aTimeoutOf(step.units * options.timeUnitMs, signal).hasPassed()
    } else if (step.kind === 'start') {
      if (await trigger('fault_start')) {
        active = true
        ++summary.started
      }
    } else {
      if (await trigger('fault_stop')) {
        active = false
        ++summary.stopped
      }
    }
  }

  if (active) {
    logger.info('healing an active fault at the end of the nemesis timeline')
    if (await trigger('fault_stop')) {
      ++summary.stopped
      summary.healedAtEnd = true
    }
  }
  return summary
}
