import { z } from 'zod'

export const RunMeta = z.object({
  runId: z.string().min(1),
  /**
   * A human-readable summary of the run's parameters.
   */
  name: z.string(),
  backend: z.string().min(1),
  /**
   * The command line of the run, starting with the command name.
   */
  argv: z.string().array(),
  /**
   * ISO-8601.
   */
  startedAt: z.string(),
  config: z.record(z.string(), z.unknown()),
  nodes: z.string().array(),
})
export type RunMeta = z.infer<typeof RunMeta>

export const RUN_FILE = 'run.json'
export const HISTORY_FILE = 'history.jsonl'
export const RESULTS_FILE = 'results.json'

/**
 * A compact UTC timestamp (e.g. `20240131T235959.123Z`) whose lexicographic order is its chronological order.
 */
export function toStamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '')
}

export const STAMP_PATTERN = /^\d{8}T\d{6}\.\d{3}Z(-\d+)?$/
