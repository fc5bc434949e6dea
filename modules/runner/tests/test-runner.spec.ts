import { Deployment } from 'backends'
import { TIMELINE_FILE } from 'checkers'
import { Client, InvokeResult, ok } from 'client-protocol'
import { CheckerResult, Invocation, isClientOperation, isNemesisOperation } from 'core-types'
import * as fse from 'fs-extra'
import { HarnessError } from 'harness-error'
import { createNopLogger } from 'logger'
import { NoopFaultInjector } from 'nemesis'
import * as path from 'path'
import { RESULTS_FILE, RUN_FILE, RunStore } from 'run-store'
import * as Tmp from 'tmp-promise'

import { parseTestOptions, TestRunner } from '../src'

class FakeClient implements Client {
  opened = false
  closed = false

  constructor(private readonly failOpen = false) {}

  async open(node: string) {
    if (this.failOpen) {
      throw new Error(`${node} is unreachable`)
    }
    this.opened = true
  }
  async setup() {}
  async invoke(_invocation: Invocation): Promise<InvokeResult> {
    return ok(null)
  }
  async teardown() {}
  async close() {
    this.closed = true
  }
}

describe('TestRunner', () => {
  const logger = createNopLogger()
  let tmp: Tmp.DirectoryResult
  let store: RunStore
  beforeEach(async () => {
    tmp = await Tmp.dir({ unsafeCleanup: true })
    store = new RunStore(path.join(tmp.path, 'store'), logger)
  })
  afterEach(async () => {
    await tmp.cleanup()
  })

  const fastOptions = {
    backend: 'memory',
    nodes: ['n1', 'n2', 'n3'],
    opGenRate: 10,
    opsPerKey: 20,
    conPerKey: 3,
    concurrency: '1n',
    valueRange: 5,
    timeLimit: 10,
    faultWindow: 5,
    timeUnitMs: 10,
  }

  test('a fault-free run against the in-memory register is linearizable', async () => {
    const runner = new TestRunner(store, logger)
    let analyzed: CheckerResult | undefined
    const started = runner.events.awaitFor('runStarted', e => e.lanes > 0)
    runner.events.on('analysisEnded', e => {
      analyzed = e
    })

    const options = parseTestOptions(fastOptions)
    const outcome = await runner.run(options, ['run', 'memory'])

    expect(outcome.result?.valid).toBe(true)
    expect(Object.keys(outcome.result?.results ?? {}).sort()).toEqual(['linear', 'perf', 'timeline'])
    expect(analyzed).toEqual(outcome.result)
    expect(await started).toMatchObject({ dir: outcome.dir, lanes: 3, plannedFaults: [] })

    expect(outcome.history.length).toBeGreaterThan(0)
    expect(outcome.history.filter(isNemesisOperation)).toEqual([])
    const clientOps = outcome.history.filter(isClientOperation)
    expect(clientOps.every(op => op.outcome !== 'info')).toBe(true)
    expect(new Set(clientOps.map(op => op.process))).toEqual(new Set([0, 1, 2]))

    expect(await fse.pathExists(path.join(outcome.dir, TIMELINE_FILE))).toBe(true)
    expect(await store.readResults(outcome.dir)).toEqual(outcome.result)
    const meta = await fse.readJSON(path.join(outcome.dir, RUN_FILE))
    expect(meta).toMatchObject({
      runId: outcome.runId,
      name: 'memory r=10 o=20 t=3 c=1n v=5 l=10 f=5',
      backend: 'memory',
      argv: ['run', 'memory'],
      nodes: ['n1', 'n2', 'n3'],
    })
    expect((await store.load(outcome.dir)).history).toEqual(outcome.history)
  })

  test('faults are recorded as nemesis operations and healed by the end of the run', async () => {
    const runner = new TestRunner(store, logger)
    const started = runner.events.awaitFor('runStarted', () => true)
    const ended: number[] = []
    runner.events.on('workloadEnded', e => {
      ended.push(e.operations)
    })
    const options = parseTestOptions({
      ...fastOptions,
      nodes: ['n1', 'n2', 'n3', 'n4', 'n5'],
      concurrency: '5',
      conPerKey: 5,
      timeLimit: 40,
      timeUnitMs: 5,
      invokeTimeoutUnits: 2,
      skipChecker: true,
    })
    const outcome = await runner.run(options, ['run', 'memory'])

    expect(outcome.result).toBeUndefined()
    expect(await fse.pathExists(path.join(outcome.dir, RESULTS_FILE))).toBe(false)
    expect(ended).toEqual([outcome.history.length])
    expect((await started).plannedFaults).toEqual([
      { startTime: 8, duration: 5 },
      { startTime: 18, duration: 5 },
      { startTime: 28, duration: 5 },
    ])

    const nemesisOps = outcome.history.filter(isNemesisOperation)
    const starts = nemesisOps.filter(op => op.f === 'fault_start')
    const stops = nemesisOps.filter(op => op.f === 'fault_stop')
    expect(starts.length).toBeGreaterThan(0)
    expect(stops.length).toEqual(starts.length)
    expect(nemesisOps.at(-1)?.f).toEqual('fault_stop')
    expect(stops.every(op => op.value === 'fully connected')).toBe(true)
    expect(starts.map(op => op.value?.split(' | ').map(side => side.split(' ').length))).toEqual(
      starts.map(() => [2, 3]),
    )
  })

  test('a client that cannot be opened aborts the run before anything is stored', async () => {
    const clients: FakeClient[] = []
    const deployment: Deployment = {
      clientFactory: () => {
        const ret = new FakeClient(clients.length === 2)
        clients.push(ret)
        return ret
      },
      faultInjector: new NoopFaultInjector(),
    }
    const runner = new TestRunner(store, logger, { deployment })
    const options = parseTestOptions({ ...fastOptions, concurrency: '3' })

    const e = await runner.run(options, ['run', 'memory']).catch((err: unknown) => err)
    expect(e).toBeInstanceOf(HarnessError)
    expect(e).toMatchObject({ hint: 'setup', message: 'could not set up the client of lane 2 (node n3): n3 is unreachable' })
    expect(clients.map(c => [c.opened, c.closed])).toEqual([
      [true, true],
      [true, true],
      [false, false],
    ])
    expect(await store.list()).toEqual([])
  })

  test('a run against a replaced deployment uses its clients', async () => {
    const deployment: Deployment = { clientFactory: () => new FakeClient(), faultInjector: new NoopFaultInjector() }
    const runner = new TestRunner(store, logger, { deployment })
    const outcome = await runner.run(parseTestOptions(fastOptions), ['run', 'memory'])
    const reads = outcome.history.filter(isClientOperation).filter(op => op.f === 'read')
    expect(reads.every(op => op.value === null && op.outcome === 'ok')).toBe(true)
  })

  test('clients and the fault injector are torn down when the run directory cannot be created', async () => {
    class ReadOnlyStore extends RunStore {
      async create(): Promise<never> {
        throw new Error('read-only file system')
      }
    }
    const torn: string[] = []
    class TrackedInjector extends NoopFaultInjector {
      async teardown() {
        torn.push('injector')
      }
    }
    const clients: FakeClient[] = []
    const deployment: Deployment = {
      clientFactory: () => {
        const ret = new FakeClient()
        clients.push(ret)
        return ret
      },
      faultInjector: new TrackedInjector(),
    }
    const runner = new TestRunner(new ReadOnlyStore(path.join(tmp.path, 'ro'), logger), logger, { deployment })

    await expect(runner.run(parseTestOptions(fastOptions), ['run', 'memory'])).rejects.toThrow('read-only file system')
    expect(clients.map(c => [c.opened, c.closed])).toEqual([
      [true, true],
      [true, true],
      [true, true],
    ])
    expect(torn).toEqual(['injector'])
  })
})
