import { CheckerResult, Validity } from 'core-types'
import execa from 'execa'
import { errorLike } from 'misc'

import { Checker } from './checker'

export const MAX_OUTPUT_LENGTH = 4000

export interface ExternalCheckerOptions {
  /**
   * The executable to run. It is invoked as `<path> --test-dir <runDir>`.
   */
  path: string
  timeoutMs: number
}

/**
 * Maps the exit code of an external checker to a verdict: 0 is valid, 1 is invalid, anything else (including no exit
 * code at all) means the checker itself failed.
 */
export function validityOfExitCode(exitCode: number | undefined): Validity {
  return exitCode === 0 ? true : exitCode === 1 ? false : 'unknown'
}

function truncate(s: string) {
  return s.length <= MAX_OUTPUT_LENGTH ? s : `...${s.slice(s.length - MAX_OUTPUT_LENGTH)}`
}

/**
 * Hands the stored run to a separate checker process. Only the exit code decides the verdict; the output is captured
 * for diagnostics but never parsed. A crash, a signal, or a timeout yields `'unknown'`.
 */
export function externalChecker(options: ExternalCheckerOptions): Checker {
  return {
    async check({ runDir, logger }): Promise<CheckerResult> {
      if (!runDir) {
        return { valid: 'unknown', message: 'the external checker needs a stored run' }
      }
      logger.info(`running external checker: ${options.path} --test-dir ${runDir}`)
      const p = await execa(options.path, ['--test-dir', runDir], {
        reject: false,
        all: true,
        timeout: options.timeoutMs,
      })
      // undefined when the process could not be spawned at all
      const exitCode: number | undefined = p.exitCode
      const output = truncate((p.all ?? '').trim())
      logger.info(`external checker exited with ${exitCode}`, { output, signal: p.signal, timedOut: p.timedOut })

      const details = { exitCode: exitCode ?? null, output }
      if (p.timedOut) {
        return { valid: 'unknown', message: `external checker timed out after ${options.timeoutMs} ms`, details }
      }
      if (p.signal) {
        return { valid: 'unknown', message: `external checker was killed by ${p.signal}`, details }
      }
      if (exitCode === undefined) {
        return { valid: 'unknown', message: `external checker could not be run: ${errorLike(p).message}`, details }
      }
      const valid = validityOfExitCode(exitCode)
      const message =
        valid === 'unknown' ? `external checker failed with exit code ${exitCode}` : `exit code ${exitCode}`
      return { valid, message: output.length > 0 ? `${message}\n${output}` : message, details }
    },
  }
}
