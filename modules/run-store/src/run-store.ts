import { CheckerResult, CheckerResultShape, History, Operation } from 'core-types'
import * as fse from 'fs-extra'
import { HarnessError } from 'harness-error'
import { Logger } from 'logger'
import { errorLike, sortBy } from 'misc'
import * as path from 'path'

import { HistoryRecorder } from './history-recorder'
import { HISTORY_FILE, RESULTS_FILE, RUN_FILE, RunMeta, STAMP_PATTERN, toStamp } from './run-meta'

export interface StoredRun {
  backend: string
  stamp: string
  dir: string
}

export interface LoadedRun {
  dir: string
  meta: RunMeta
  history: History
}

/**
 * Persists runs under `<storeDir>/<backend>/<stamp>/`. Listing (and resolving a run by its position) looks at directory
 * names only: no run content is read.
 */
export class RunStore {
  constructor(readonly storeDir: string, private readonly logger: Logger) {}

  /**
   * Creates the directory of a new run, writes its metadata, and returns a recorder that appends the run's operations
   * to its history file.
   */
  async create(meta: RunMeta): Promise<{ dir: string; recorder: HistoryRecorder }> {
    const base = path.join(this.storeDir, meta.backend, toStamp(new Date(meta.startedAt)))
    let dir = base
    for (let i = 1; await fse.pathExists(dir); ++i) {
      dir = `${base}-${i}`
    }
    await fse.mkdirp(dir)
    await fse.writeJSON(path.join(dir, RUN_FILE), RunMeta.parse(meta), { spaces: 2 })
    await fse.writeFile(path.join(dir, HISTORY_FILE), '')
    this.logger.info(`run ${meta.runId} is stored at ${dir}`)
    return { dir, recorder: new HistoryRecorder(this.logger, path.join(dir, HISTORY_FILE)) }
  }

  /**
   * All stored runs, oldest first.
   */
  async list(): Promise<StoredRun[]> {
    if (!(await fse.pathExists(this.storeDir))) {
      return []
    }
    const ret: StoredRun[] = []
    for (const backend of await subdirectories(this.storeDir)) {
      for (const stamp of await subdirectories(path.join(this.storeDir, backend))) {
        if (STAMP_PATTERN.test(stamp)) {
          ret.push({ backend, stamp, dir: path.join(this.storeDir, backend, stamp) })
        }
      }
    }
    return sortBy(ret, r => `${r.stamp} ${r.backend}`)
  }

  /**
   * Finds the directory of a run. `which` is either a position in `list()` (a negative position counts back from the
   * most recent run: -1 is the most recent) or a path to a run directory.
   */
  async resolve(which: string): Promise<string> {
    if (/^-?\d+$/.test(which)) {
      const runs = await this.list()
      const n = Number(which)
      const i = n < 0 ? runs.length + n : n
      const run = runs.at(i)
      if (i < 0 || !run) {
        throw new HarnessError(`no run at position ${which} (found ${runs.length} runs in ${this.storeDir})`, 'input')
      }
      return run.dir
    }

    const dir = path.resolve(which)
    const stat = await fse.stat(dir).catch(() => undefined)
    if (!stat?.isDirectory()) {
      throw new HarnessError(`not a run directory: ${which}`, 'input')
    }
    return dir
  }

  /**
   * Reads and validates a stored run. Anything missing or malformed is reported as an input error.
   */
  async load(dir: string): Promise<LoadedRun> {
    const meta = RunMeta.safeParse(await readJson(path.join(dir, RUN_FILE)))
    if (!meta.success) {
      throw new HarnessError(`malformed ${RUN_FILE} in ${dir}: ${meta.error.message}`, 'input')
    }

    const historyFile = path.join(dir, HISTORY_FILE)
    const text = await fse.readFile(historyFile, 'utf-8').catch((e: unknown) => {
      throw new HarnessError(`cannot read ${historyFile}: ${errorLike(e).message}`, 'input')
    })
    const history: Operation[] = []
    const lines = text.split('\n')
    for (let i = 0; i < lines.length; ++i) {
      const line = lines[i].trim()
      if (line.length === 0) {
        continue
      }
      const parsed = Operation.safeParse(parseJson(line, `${historyFile}:${i + 1}`))
      if (!parsed.success) {
        throw new HarnessError(`malformed operation at ${historyFile}:${i + 1}: ${parsed.error.message}`, 'input')
      }
      if (parsed.data.index !== history.length) {
        throw new HarnessError(
          `operation at ${historyFile}:${i + 1} has index ${parsed.data.index} (expected ${history.length})`,
          'input',
        )
      }
      history.push(parsed.data)
    }
    this.logger.info(`loaded ${history.length} operations from ${historyFile}`)
    return { dir, meta: meta.data, history: Object.freeze(history) }
  }

  async writeResults(dir: string, result: CheckerResult) {
    await fse.writeJSON(path.join(dir, RESULTS_FILE), result, { spaces: 2 })
  }

  async readResults(dir: string): Promise<CheckerResult | undefined> {
    const file = path.join(dir, RESULTS_FILE)
    if (!(await fse.pathExists(file))) {
      return undefined
    }
    const parsed = CheckerResultShape.safeParse(await readJson(file))
    if (!parsed.success) {
      throw new HarnessError(`malformed ${file}: ${parsed.error.message}`, 'input')
    }
    return parsed.data
  }
}

async function subdirectories(dir: string): Promise<string[]> {
  const entries = await fse.readdir(dir, { withFileTypes: true })
  return entries.filter(e => e.isDirectory()).map(e => e.name)
}

function parseJson(text: string, location: string): unknown {
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new HarnessError(`malformed JSON at ${location}: ${errorLike(e).message}`, 'input')
  }
}

async function readJson(file: string): Promise<unknown> {
  try {
    return await fse.readJSON(file)
  } catch (e) {
    throw new HarnessError(`cannot read ${file}: ${errorLike(e).message}`, 'input')
  }
}
