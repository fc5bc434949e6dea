import { Backend, Deployment, getBackend } from 'backends'
import { buildCheckerSet, checkSafe, selectCorrectness } from 'checkers'
import { Client } from 'client-protocol'
import { CheckerResult, History, newRunId, RunId } from 'core-types'
import { HarnessError } from 'harness-error'
import { Logger, withTag } from 'logger'
import { errorLike, Int, TypedPublisher } from 'misc'
import { nemesisSchedule, plannedFaultWindows, runNemesis, scheduleEnd } from 'nemesis'
import { ConcurrentGenerator, RandomFn } from 'op-generator'
import { RunStore } from 'run-store'

import { resolveConcurrency, TestOptions, testName } from './harness-config'
import { RunEvents } from './run-events'
import { runWorkload } from './workload-driver'

export interface TestRunOutcome {
  runId: RunId
  dir: string
  history: History
  /**
   * Absent if analysis was skipped.
   */
  result?: CheckerResult
}

export interface TestRunnerOptions {
  random?: RandomFn
  /**
   * Replaces the backend's own deployment (clients and fault injector).
   */
  deployment?: Deployment
}

/**
 * Runs a full test: sets up the clients and the fault injector, drives the workload and the nemesis concurrently until
 * the generator is exhausted or the time limit is reached, stores the history, and (unless skipped) analyzes it.
 */
export class TestRunner {
  private readonly publisher = new TypedPublisher<RunEvents>()

  constructor(
    private readonly store: RunStore,
    private readonly logger: Logger,
    private readonly options: TestRunnerOptions = {},
  ) {}

  get events() {
    return this.publisher
  }

  async run(testOptions: TestOptions, argv: readonly string[]): Promise<TestRunOutcome> {
    const { logger } = this
    const unit = testOptions.timeUnitMs
    const backend: Backend = getBackend(testOptions.backend)
    const nodes = testOptions.nodes
    const invokeTimeoutMs = testOptions.invokeTimeoutUnits * unit
    const deployment =
      this.options.deployment ??
      backend.deploy(
        {
          nodes,
          quorumRead: testOptions.quorumRead,
          requestTimeoutMs: invokeTimeoutMs,
          faultCommands: faultCommandsOf(testOptions),
          random: this.options.random,
        },
        logger,
      )

    const concurrency = resolveConcurrency(testOptions.concurrency, nodes.length)
    // Re-based once the workload starts, so that setup time does not eat into the time limit.
    let start = performance.now()
    const runMs = testOptions.timeLimit * unit
    const generator = new ConcurrentGenerator(
      {
        opGenRate: testOptions.opGenRate,
        opsPerKey: Int(testOptions.opsPerKey),
        concurrencyPerKey: Int(testOptions.conPerKey),
        valueRange: Int(testOptions.valueRange),
        timeUnitMs: unit,
      },
      { concurrency, random: this.options.random, now: () => performance.now() - start, deadline: runMs },
    )
    const lanes = generator.lanes
    logger.info(`${lanes.length} lanes over ${nodes.length} nodes (concurrency: ${concurrency})`)

    const clients = await this.setUp(deployment, lanes.map(lane => nodes[lane.id % nodes.length]), nodes)

    const schedule = nemesisSchedule({ timeLimit: testOptions.timeLimit, faultWindow: testOptions.faultWindow })
    const plannedFaults = plannedFaultWindows(schedule)
    logger.info(`nemesis plan: ${plannedFaults.length} faults, last step at unit ${scheduleEnd(schedule)}`)

    const runId = newRunId()
    const { dir, recorder } = await this.tearingDownOnFailure(deployment, clients, async () => {
      const created = await this.store.create({
        runId,
        name: testName(testOptions),
        backend: backend.name,
        argv: [...argv],
        startedAt: new Date().toISOString(),
        config: { ...testOptions },
        nodes: [...nodes],
      })
      await this.publisher.publish('runStarted', {
        runId,
        dir: created.dir,
        lanes: lanes.length,
        nodes,
        plannedFaults,
      })
      return created
    })

    start = performance.now()
    const clock = () => Math.round((performance.now() - start) * 1e6)
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), runMs)
    const nemesisController = new AbortController()
    controller.signal.addEventListener('abort', () => nemesisController.abort(), { once: true })

    try {
      const workload = runWorkload({
        lanes,
        clients,
        recorder,
        clock,
        invokeTimeoutMs,
        signal: controller.signal,
        logger: withTag(logger, 'workload'),
        publisher: this.publisher,
      }).finally(() => nemesisController.abort())
      const nemesis = runNemesis(
        schedule,
        deployment.faultInjector,
        {
          timeUnitMs: unit,
          signal: nemesisController.signal,
          clock,
          logger: withTag(logger, 'nemesis'),
          record: async e => {
            await recorder.append({ ...e, process: 'nemesis', key: null, outcome: 'info' })
            await this.publisher.publish('faultChanged', e)
          },
        },
      )
      const [w, n] = await Promise.allSettled([workload, nemesis])
      if (w.status === 'rejected') {
        throw w.reason
      }
      if (n.status === 'rejected') {
        throw n.reason
      }
      logger.info(`workload summary`, w.value)
      logger.info(`nemesis summary`, n.value)
    } finally {
      clearTimeout(timer)
      await this.tearDown(deployment, clients)
    }

    const history = await recorder.close()
    await this.publisher.publish('workloadEnded', {
      operations: history.length,
      elapsedMs: performance.now() - start,
    })

    const checker = buildCheckerSet(
      selectCorrectness('live', { skipChecker: testOptions.skipChecker, useExternal: false }),
    )
    if (!checker) {
      logger.print('analysis skipped', 'moderate')
      return { runId, dir, history }
    }
    const result = await checkSafe(checker, { history, runDir: dir, logger })
    await this.store.writeResults(dir, result)
    await this.publisher.publish('analysisEnded', result)
    return { runId, dir, history, result }
  }

  private async setUp(deployment: Deployment, laneNodes: string[], nodes: readonly string[]): Promise<Client[]> {
    const clients: Client[] = []
    try {
      await deployment.faultInjector.setup(nodes)
    } catch (e) {
      throw new HarnessError(`could not set up the fault injector: ${errorLike(e).message}`, 'setup')
    }
    for (const [i, node] of laneNodes.entries()) {
      const client = deployment.clientFactory()
      try {
        await client.open(node)
        clients.push(client)
        await client.setup()
      } catch (e) {
        await this.tearDown(deployment, clients)
        throw new HarnessError(
          `could not set up the client of lane ${i} (node ${node}): ${errorLike(e).message}`,
          'setup',
        )
      }
    }
    return clients
  }

  private async tearingDownOnFailure<T>(
    deployment: Deployment,
    clients: readonly Client[],
    f: () => Promise<T>,
  ): Promise<T> {
    try {
      return await f()
    } catch (e) {
      await this.tearDown(deployment, clients)
      throw e
    }
  }

  private async tearDown(deployment: Deployment, clients: readonly Client[]) {
    const warn = (what: string) => (e: unknown) => this.logger.warn(`${what} failed: ${errorLike(e).message}`)
    for (const client of clients) {
      await client.teardown().catch(warn('client teardown'))
      await client.close().catch(warn('client close'))
    }
    await deployment.faultInjector.teardown().catch(warn('fault injector teardown'))
  }
}

function faultCommandsOf(options: TestOptions) {
  const { faultStartCommand: startCommand, faultStopCommand: stopCommand } = options
  if (startCommand === undefined && stopCommand === undefined) {
    return undefined
  }
  if (startCommand === undefined || stopCommand === undefined) {
    throw new HarnessError('fault start and stop commands must be given together', 'options')
  }
  return { startCommand, stopCommand }
}
