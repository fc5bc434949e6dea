import { CheckerResult, FaultWindow, Operation } from 'core-types'
import { NemesisEvent } from 'nemesis'

export type RunEvents = {
  runStarted: {
    runId: string
    dir: string
    lanes: number
    nodes: readonly string[]
    /**
     * Fault windows (in time units since the start of the run) the nemesis will open if every step runs on time.
     */
    plannedFaults: FaultWindow[]
  }
  operationRecorded: Operation
  faultChanged: NemesisEvent
  workloadEnded: { operations: number; elapsedMs: number }
  analysisEnded: CheckerResult
}
