import { ClientFunction, faultWindowsOf, isClientOperation, Outcome } from 'core-types'
import { bump, quantile } from 'misc'

import { Checker } from './checker'

type Counts = Record<Outcome, number>

const NANOS_PER_MILLI = 1_000_000

function zeroCounts(): Counts {
  return { ok: 0, fail: 0, info: 0 }
}

/**
 * Summarizes the latency and the outcomes of the client operations of a run. Never affects validity.
 */
export function perf(): Checker {
  return {
    async check({ history }) {
      const ops = history.filter(isClientOperation)
      const byOutcome = zeroCounts()
      const byFunction: Record<ClientFunction, Counts> = { read: zeroCounts(), write: zeroCounts(), cas: zeroCounts() }
      const byError = new Map<string, number>()
      for (const op of ops) {
        ++byOutcome[op.outcome]
        ++byFunction[op.f][op.outcome]
        if (op.error !== undefined) {
          bump(byError, op.error)
        }
      }

      const latencies = ops
        .filter(op => op.outcome === 'ok')
        .map(op => (op.completeTime - op.invokeTime) / NANOS_PER_MILLI)
        .sort((a, b) => a - b)
      const first = ops.reduce((acc, op) => Math.min(acc, op.invokeTime), Number.POSITIVE_INFINITY)
      const last = ops.reduce((acc, op) => Math.max(acc, op.completeTime), 0)
      const spanSeconds = ops.length > 0 ? (last - first) / 1e9 : 0

      return {
        valid: true,
        message: `${ops.length} operations: ${byOutcome.ok} ok, ${byOutcome.fail} fail, ${byOutcome.info} info`,
        details: {
          opCount: ops.length,
          byOutcome,
          byFunction,
          byError: Object.fromEntries(byError),
          latencyMs: {
            p50: quantile(latencies, 0.5),
            p95: quantile(latencies, 0.95),
            p99: quantile(latencies, 0.99),
            max: latencies.at(-1),
          },
          throughput: spanSeconds > 0 ? ops.length / spanSeconds : undefined,
          faultWindows: faultWindowsOf(history).length,
        },
      }
    },
  }
}
