import { allBackends, BackendName, getBackend } from 'backends'
import { CheckerResult, Validity, validityToString } from 'core-types'
import * as fse from 'fs-extra'
import { HarnessError, isHarnessError } from 'harness-error'
import { createDefaultLogger, Criticality, Logger } from 'logger'
import { camelizeRecord, errorLike } from 'misc'
import * as path from 'path'
import { checkRun, HarnessConfig, parseTestOptions, readConfigFile, TestRunner } from 'runner'
import { RunStore } from 'run-store'
import yargs from 'yargs'

export const FATAL_EXIT_CODE = 254

export const LOG_FILE_NAME = 'harness.log'

export interface CliEnv {
  /**
   * Where `.harness.jsonc` is looked up and relative paths are resolved against.
   */
  cwd: string
  createLogger?: (logFile: string, criticality: Criticality) => Logger
  /**
   * Receives the messages of failures that happen before a logger is available.
   */
  errStream?: NodeJS.WritableStream
}

export function exitCodeOf(v: Validity): number {
  return v === true ? 0 : v === false ? 1 : 2
}

export function loudnessToCriticality(s: string): Criticality {
  if (s === 's') {
    return 'high'
  }
  if (s === 'm') {
    return 'moderate'
  }
  if (s === 'l') {
    return 'low'
  }
  throw new HarnessError(`illegal loudness value: "${s}"`, 'options')
}

interface CommonOptions {
  storeDir?: string
  loudness: string
}

interface Session {
  config: HarnessConfig
  store: RunStore
  logger: Logger
}

async function openSession(env: CliEnv, options: CommonOptions): Promise<Session> {
  const config = readConfigFile(env.cwd)
  const storeDir = path.resolve(env.cwd, options.storeDir ?? config.storeDir)
  await fse.ensureDir(storeDir)
  const logFile = path.join(storeDir, LOG_FILE_NAME)
  const createLogger = env.createLogger ?? createDefaultLogger
  const logger = createLogger(logFile, loudnessToCriticality(options.loudness))
  logger.info(`Logger initialized (cwd: ${env.cwd})`)
  return { config, store: new RunStore(storeDir, logger), logger }
}

/**
 * Nodes come from (in order of precedence) --nodes, --nodes-file, the config file, or the backend's defaults.
 */
export async function resolveNodes(
  backend: BackendName,
  flags: { nodes?: string[]; nodesFile?: string },
  config: HarnessConfig,
  cwd: string,
): Promise<string[]> {
  const fromFlag = (flags.nodes ?? []).flatMap(n => n.split(',')).map(n => n.trim()).filter(Boolean)
  if (fromFlag.length > 0) {
    return fromFlag
  }
  if (flags.nodesFile !== undefined) {
    const file = path.resolve(cwd, flags.nodesFile)
    const content = await fse.readFile(file, 'utf-8').catch((e: unknown) => {
      throw new HarnessError(`cannot read nodes file ${file}: ${errorLike(e).message}`, 'options')
    })
    const ret = content
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0 && !line.startsWith('#'))
    if (ret.length === 0) {
      throw new HarnessError(`nodes file ${file} lists no nodes`, 'options')
    }
    return ret
  }
  return [...(config.nodes ?? getBackend(backend).defaultNodes)]
}

/**
 * Prints one line per part of a composed result, then the overall verdict.
 */
export function reportResult(logger: Logger, result: CheckerResult) {
  for (const [name, r] of Object.entries(result.results ?? {})) {
    const firstLine = r.message?.split('\n').at(0)
    logger.print(`${name}: ${validityToString(r.valid)}${firstLine ? ` (${firstLine})` : ''}`, 'high')
  }
  logger.print(`Verdict: ${validityToString(result.valid)}`, 'high')
}

/**
 * Runs the command line given in `args` (without the executable). Resolves to the process exit code: 0, 1 and 2 for a
 * valid, invalid and undecided analysis; 254 for a fatal error.
 */
export async function main(args: readonly string[], env: CliEnv): Promise<number> {
  let exitCode = 0
  const current: { logger?: Logger } = {}
  const open = async (options: CommonOptions) => {
    const session = await openSession(env, options)
    current.logger = session.logger
    return session
  }

  const parser = yargs([...args])
    .scriptName('harness')
    .option('store-dir', {
      describe: 'directory under which runs are stored (overrides the config file)',
      type: 'string',
    })
    .option('loudness', {
      describe: `how detailed should the progress report be. Values are T-shirt sizes:
          s - just the verdict and errors
          m - progress milestones
          l - every fault`,
      choices: ['s', 'm', 'l'],
      default: 'm',
    })
    .command(
      'run <backend>',
      'runs a test against a backend, then analyzes the recorded history',
      y =>
        y
          .positional('backend', {
            describe: allBackends()
              .map(b => `${b.name}: ${b.description}`)
              .join('; '),
            choices: BackendName.options,
            demandOption: true,
          })
          .option('nodes', { describe: 'nodes of the system under test', type: 'string', array: true })
          .option('nodes-file', { describe: 'a file listing the nodes, one per line', type: 'string' })
          .option('op-gen-rate', { describe: 'invocations per lane per time unit (default: 10)', type: 'number' })
          .option('ops-per-key', { describe: 'invocations per key, before jitter (default: 100)', type: 'number' })
          .option('con-per-key', { describe: 'lanes working on a key at the same time (default: 5)', type: 'number' })
          .option('concurrency', {
            describe: 'total number of lanes; "3n" means three per node (default: 50)',
            type: 'string',
          })
          .option('value-range', { describe: 'values are drawn from [0, value-range) (default: 10)', type: 'number' })
          .option('time-limit', {
            describe: 'length of the run in time units, at least 10 (default: 40)',
            type: 'number',
          })
          .option('fault-window', { describe: 'length of a fault in time units (default: 5)', type: 'number' })
          .option('skip-checker', { describe: 'record the history without analyzing it', type: 'boolean' })
          .option('quorum-read', { describe: 'use quorum reads (etcd)', type: 'boolean' })
          .option('fault-start-cmd', { describe: 'shell command that starts a fault (etcd)', type: 'string' })
          .option('fault-stop-cmd', { describe: 'shell command that stops a fault (etcd)', type: 'string' }),
      async rawArgv => {
        const argv = camelizeRecord(rawArgv)
        const { config, store, logger } = await open(argv)
        const nodes = await resolveNodes(argv.backend, argv, config, env.cwd)
        const options = parseTestOptions({
          backend: argv.backend,
          nodes,
          opGenRate: argv.opGenRate,
          opsPerKey: argv.opsPerKey,
          conPerKey: argv.conPerKey,
          concurrency: argv.concurrency,
          valueRange: argv.valueRange,
          timeLimit: argv.timeLimit,
          faultWindow: argv.faultWindow,
          skipChecker: argv.skipChecker,
          quorumRead: argv.quorumRead,
          faultStartCommand: argv.faultStartCmd ?? config.faultStartCommand,
          faultStopCommand: argv.faultStopCmd ?? config.faultStopCommand,
          timeUnitMs: config.timeUnitMs,
          invokeTimeoutUnits: config.invokeTimeoutUnits,
        })

        const runner = new TestRunner(store, logger)
        runner.events.on('runStarted', e => {
          logger.print(
            `run ${e.runId}: ${e.lanes} lanes against ${e.nodes.join(',')}, ${e.plannedFaults.length} faults planned, stored at ${e.dir}`,
          )
        })
        runner.events.on('faultChanged', e => {
          logger.print(`${e.f}: ${e.value ?? e.error ?? ''}`, 'low')
        })
        runner.events.on('workloadEnded', e => {
          logger.print(`${e.operations} operations recorded in ${(e.elapsedMs / 1000).toFixed(1)}s`)
        })
        const outcome = await runner.run(options, args.slice(Math.max(0, args.indexOf('run'))))
        if (outcome.result) {
          reportResult(logger, outcome.result)
          exitCode = exitCodeOf(outcome.result.valid)
        }
      },
    )
    .command(
      'check [which]',
      'analyzes a stored run again',
      y =>
        y
          .positional('which', {
            describe: 'position of the run (-1 is the most recent, 0 the oldest) or a run directory',
            type: 'string',
            default: '-1',
          })
          .option('external-checker', { describe: 'use the external checker', type: 'boolean', default: false })
          .option('external-checker-path', {
            describe: 'executable of the external checker (overrides the config file)',
            type: 'string',
          }),
      async rawArgv => {
        const argv = camelizeRecord(rawArgv)
        const { config, store, logger } = await open(argv)
        const { dir, result, elapsedMs } = await checkRun(
          store,
          {
            which: String(argv.which),
            useExternal: argv.externalChecker,
            externalCheckerPath: argv.externalCheckerPath ?? config.externalCheckerPath,
            externalCheckerTimeoutMs: config.externalCheckerTimeoutUnits * config.timeUnitMs,
          },
          logger,
        )
        logger.print(`Analyzed ${dir}`)
        reportResult(logger, result)
        logger.print(`Time spent in checker: ${elapsedMs.toFixed(2)} msecs`, 'high')
        exitCode = exitCodeOf(result.valid)
      },
    )
    .command(
      'list',
      'lists the stored runs, most recent last',
      y => y,
      async rawArgv => {
        const { store, logger } = await open(camelizeRecord(rawArgv))
        const runs = await store.list()
        if (runs.length === 0) {
          logger.print(`no runs in ${store.storeDir}`, 'high')
          return
        }
        runs.forEach((r, i) => logger.print(`${i - runs.length}\t${r.backend}/${r.stamp}`, 'high'))
      },
    )
    .demandCommand(1)
    .strict()
    .exitProcess(false)
    .fail((message, err) => {
      throw err ?? new HarnessError(message, 'options')
    })

  try {
    await parser.parseAsync()
    return exitCode
  } catch (e) {
    const message = errorLike(e).message ?? String(e)
    const { logger } = current
    if (!logger) {
      ;(env.errStream ?? process.stderr).write(`${message}\n`)
    } else if (isHarnessError(e)) {
      logger.print(message, 'high')
    } else {
      logger.error('crashed', e)
    }
    return FATAL_EXIT_CODE
  }
}
