import { FaultWindow } from 'core-types'

export type NemesisStep = { kind: 'sleep'; units: number } | { kind: 'start' } | { kind: 'stop' }

export interface ScheduleParams {
  /**
   * Length of the whole run, in time units.
   */
  timeLimit: number
  /**
   * Length of a fault, and of the quiet period before it, in time units.
   */
  faultWindow: number
  warmup?: number
  cooldown?: number
}

export const DEFAULT_WARMUP = 3
export const DEFAULT_COOLDOWN = 10

/**
 * The number of [sleep, start, sleep, stop] cycles that fit in a run: `(timeLimit - cooldown) / (2 * faultWindow)`,
 * further capped so that the last stop happens at least one fault window before `timeLimit`.
 */
export function faultCycles(params: ScheduleParams): number {
  const { timeLimit, faultWindow } = params
  const warmup = params.warmup ?? DEFAULT_WARMUP
  const cooldown = params.cooldown ?? DEFAULT_COOLDOWN
  if (faultWindow <= 0) {
    return 0
  }
  const nominal = Math.floor((timeLimit - cooldown) / (2 * faultWindow))
  const fitting = Math.floor((timeLimit - warmup - faultWindow) / (2 * faultWindow))
  return Math.max(0, Math.min(nominal, fitting))
}

export function nemesisSchedule(params: ScheduleParams): NemesisStep[] {
  const n = faultCycles(params)
  const ret: NemesisStep[] = [{ kind: 'sleep', units: params.warmup ?? DEFAULT_WARMUP }]
  for (let i = 0; i < n; ++i) {
    ret.push({ kind: 'sleep', units: params.faultWindow })
    ret.push({ kind: 'start' })
    ret.push({ kind: 'sleep', units: params.faultWindow })
    ret.push({ kind: 'stop' })
  }
  return ret
}

/**
 * The fault windows a schedule would produce if every step ran on time. Times are in time units since the start of
 * the schedule.
 */
export function plannedFaultWindows(schedule: readonly NemesisStep[]): FaultWindow[] {
  const ret: FaultWindow[] = []
  let t = 0
  let openedAt: number | undefined
  for (const step of schedule) {
    if (step.kind === 'sleep') {
      t += step.units
    } else if (step.kind === 'start') {
      openedAt ??= t
    } else if (openedAt !== undefined) {
      ret.push({ startTime: openedAt, duration: t - openedAt })
      openedAt = undefined
    }
  }
  return ret
}

/**
 * The time (in time units) of the last step of the schedule.
 */
export function scheduleEnd(schedule: readonly NemesisStep[]): number {
  return schedule.reduce((acc, step) => (step.kind === 'sleep' ? acc + step.units : acc), 0)
}
