import { buildCheckerSet, checkSafe, selectCorrectness } from 'checkers'
import { CheckerResult, History } from 'core-types'
import { HarnessError } from 'harness-error'
import { Logger } from 'logger'
import { RunStore } from 'run-store'

export interface CheckRunOptions {
  /**
   * A position in the run list (negative counts back from the most recent run) or a run directory.
   */
  which: string
  useExternal: boolean
  externalCheckerPath?: string
  externalCheckerTimeoutMs: number
}

export interface CheckRunOutcome {
  dir: string
  history: History
  result: CheckerResult
  /**
   * Time spent in the checkers, in milliseconds.
   */
  elapsedMs: number
}

/**
 * Analyzes a stored run again. Only the stored history (and run directory) is consulted; nothing is re-run. The new
 * results replace the stored ones.
 */
export async function checkRun(store: RunStore, options: CheckRunOptions, logger: Logger): Promise<CheckRunOutcome> {
  const dir = await store.resolve(options.which)
  const { meta, history } = await store.load(dir)
  const command = meta.argv.at(0)
  if (command !== 'run') {
    throw new HarnessError(`${dir} was not recorded by a test run (command: ${command ?? '<none>'})`, 'input')
  }

  const correctness = selectCorrectness('reanalysis', { skipChecker: false, useExternal: options.useExternal })
  const path = options.externalCheckerPath
  const checker = buildCheckerSet(correctness, {
    external: path === undefined ? undefined : { path, timeoutMs: options.externalCheckerTimeoutMs },
  })
  if (!checker) {
    throw new Error(`no checker was built for ${correctness}`)
  }

  logger.info(`checking ${history.length} operations of ${meta.name} (${correctness})`)
  const t0 = performance.now()
  const result = await checkSafe(checker, { history, runDir: dir, logger })
  const elapsedMs = performance.now() - t0
  await store.writeResults(dir, result)
  return { dir, history, result, elapsedMs }
}
