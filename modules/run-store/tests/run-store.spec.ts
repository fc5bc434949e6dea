import { Operation } from 'core-types'
import * as fse from 'fs-extra'
import { HarnessError } from 'harness-error'
import { createNopLogger } from 'logger'
import * as path from 'path'
import * as Tmp from 'tmp-promise'

import { RunMeta, RunStore, STAMP_PATTERN, toStamp } from '../src'

function meta(backend: string, startedAt: string, argv = ['run', backend]): RunMeta {
  return { runId: `id-${backend}-${startedAt}`, name: backend, backend, argv, startedAt, config: { rate: 10 }, nodes: ['n1'] }
}

async function catchError(p: Promise<unknown>): Promise<unknown> {
  try {
    await p
  } catch (e) {
    return e
  }
  throw new Error('expected a rejection')
}

describe('run-store', () => {
  const logger = createNopLogger()
  let tmp: Tmp.DirectoryResult
  let store: RunStore
  beforeEach(async () => {
    tmp = await Tmp.dir({ unsafeCleanup: true })
    store = new RunStore(tmp.path, logger)
  })
  afterEach(async () => {
    await tmp.cleanup()
  })

  test('toStamp() is compact and sortable', () => {
    expect(toStamp(new Date('2024-01-31T23:59:59.123Z'))).toEqual('20240131T235959.123Z')
    expect(STAMP_PATTERN.test('20240131T235959.123Z')).toBe(true)
    expect(STAMP_PATTERN.test('20240131T235959.123Z-2')).toBe(true)
    expect(STAMP_PATTERN.test('latest')).toBe(false)
  })

  test('a created run can be loaded back', async () => {
    const { dir, recorder } = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
    expect(dir).toEqual(path.join(tmp.path, 'memory', '20240501T100000.000Z'))
    await recorder.append({ process: 0, f: 'write', key: 0, value: 3, invokeTime: 0, completeTime: 9, outcome: 'ok' })
    await recorder.append({ process: 1, f: 'read', key: 0, value: 3, invokeTime: 10, completeTime: 19, outcome: 'ok' })
    await recorder.close()

    const loaded = await store.load(dir)
    expect(loaded.meta).toEqual(meta('memory', '2024-05-01T10:00:00.000Z'))
    expect(loaded.history).toEqual([
      { index: 0, process: 0, f: 'write', key: 0, value: 3, invokeTime: 0, completeTime: 9, outcome: 'ok' },
      { index: 1, process: 1, f: 'read', key: 0, value: 3, invokeTime: 10, completeTime: 19, outcome: 'ok' },
    ])
  })

  test('two runs that start at the same instant get distinct directories', async () => {
    const a = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
    const b = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
    expect(path.basename(a.dir)).toEqual('20240501T100000.000Z')
    expect(path.basename(b.dir)).toEqual('20240501T100000.000Z-1')
  })

  describe('list()/resolve()', () => {
    beforeEach(async () => {
      await store.create(meta('mailbox', '2024-05-02T00:00:00.000Z'))
      await store.create(meta('memory', '2024-05-01T00:00:00.000Z'))
      await store.create(meta('memory', '2024-05-03T00:00:00.000Z'))
      await fse.writeFile(path.join(tmp.path, 'harness.log'), '')
      await fse.mkdirp(path.join(tmp.path, 'memory', 'not-a-run'))
    })
    test('lists runs oldest first, across backends, by directory name only', async () => {
      expect((await store.list()).map(r => `${r.backend}/${r.stamp}`)).toEqual([
        'memory/20240501T000000.000Z',
        'mailbox/20240502T000000.000Z',
        'memory/20240503T000000.000Z',
      ])
    })
    test('negative positions count back from the most recent run', async () => {
      expect(path.basename(await store.resolve('-1'))).toEqual('20240503T000000.000Z')
      expect(path.basename(await store.resolve('-3'))).toEqual('20240501T000000.000Z')
    })
    test('non-negative positions count from the oldest run', async () => {
      expect(path.basename(await store.resolve('0'))).toEqual('20240501T000000.000Z')
      expect(path.basename(await store.resolve('1'))).toEqual('20240502T000000.000Z')
    })
    test('a position out of range is an input error', async () => {
      const e = await catchError(store.resolve('-4'))
      expect(e).toBeInstanceOf(HarnessError)
      expect(e).toMatchObject({ hint: 'input' })
      await expect(store.resolve('3')).rejects.toThrow('no run at position 3 (found 3 runs in')
    })
    test('a path is taken as a run directory', async () => {
      const dir = path.join(tmp.path, 'memory', '20240501T000000.000Z')
      expect(await store.resolve(dir)).toEqual(dir)
      await expect(store.resolve(path.join(tmp.path, 'nope'))).rejects.toThrow('not a run directory')
    })
  })

  test('list() of a store that does not exist yet is empty', async () => {
    expect(await new RunStore(path.join(tmp.path, 'nothing-here'), logger).list()).toEqual([])
  })

  describe('load()', () => {
    test('a missing run.json is an input error', async () => {
      const e = await catchError(store.load(tmp.path))
      expect(e).toBeInstanceOf(HarnessError)
      expect(e).toMatchObject({ hint: 'input' })
    })
    test('a malformed history line is an input error that names the line', async () => {
      const { dir, recorder } = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
      await recorder.close()
      const good: Operation = {
        index: 0,
        process: 0,
        f: 'write',
        key: 0,
        value: 1,
        invokeTime: 0,
        completeTime: 1,
        outcome: 'ok',
      }
      await fse.writeFile(path.join(dir, 'history.jsonl'), `${JSON.stringify(good)}\n{"index":1,"f":"jump"}\n`)
      await expect(store.load(dir)).rejects.toThrow(`malformed operation at ${path.join(dir, 'history.jsonl')}:2`)
      await fse.writeFile(path.join(dir, 'history.jsonl'), `${JSON.stringify(good)}\nnot json\n`)
      await expect(store.load(dir)).rejects.toThrow(`malformed JSON at ${path.join(dir, 'history.jsonl')}:2`)
    })
    test('indices must follow the line order', async () => {
      const { dir, recorder } = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
      await recorder.close()
      const op: Operation = { index: 1, process: 0, f: 'read', key: 0, value: null, invokeTime: 0, completeTime: 1, outcome: 'ok' }
      await fse.writeFile(path.join(dir, 'history.jsonl'), `${JSON.stringify(op)}\n`)
      await expect(store.load(dir)).rejects.toThrow('has index 1 (expected 0)')
    })
    test('an operation that completes before it was invoked is rejected', async () => {
      const { dir, recorder } = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
      await recorder.close()
      const op: Operation = { index: 0, process: 0, f: 'read', key: 0, value: null, invokeTime: 5, completeTime: 1, outcome: 'ok' }
      await fse.writeFile(path.join(dir, 'history.jsonl'), `${JSON.stringify(op)}\n`)
      await expect(store.load(dir)).rejects.toThrow('completeTime must not precede invokeTime')
    })
  })

  test('results can be written and read back', async () => {
    const { dir } = await store.create(meta('memory', '2024-05-01T10:00:00.000Z'))
    expect(await store.readResults(dir)).toBeUndefined()
    const result = {
      valid: 'unknown' as const,
      results: { linear: { valid: true }, perf: { valid: 'unknown' as const, message: 'no data' } },
    }
    await store.writeResults(dir, result)
    expect(await store.readResults(dir)).toEqual(result)
  })
})
