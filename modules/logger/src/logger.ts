import * as fs from 'fs'
import { format } from 'logform'
import * as path from 'path'
import jsonStringify from 'safe-stable-stringify'
import * as winston from 'winston'

/**
 * How important an operator-facing message is. A logger prints a message only if it is at least as critical as the
 * logger's pickiness ('high' prints the least, 'low' the most).
 */
export type Criticality = 'high' | 'moderate' | 'low'

const CRITICALITIES: readonly Criticality[] = ['high', 'moderate', 'low']

const isPrintable = (message: Criticality, pickiness: Criticality) =>
  CRITICALITIES.indexOf(message) <= CRITICALITIES.indexOf(pickiness)

export type Level = 'error' | 'warn' | 'info' | 'debug'

export interface Logger {
  /**
   * Emits an operator-facing line (and records it in the log file).
   */
  print(message: string, criticality?: Criticality): void
  info(message: string, ...rest: unknown[]): void
  debug(message: string, ...rest: unknown[]): void
  warn(message: string, ...rest: unknown[]): void
  error(message: string, err: unknown, ...rest: unknown[]): void
}

const nop = () => {}

export function createNopLogger(): Logger {
  return { print: nop, info: nop, debug: nop, warn: nop, error: nop }
}

/**
 * A logger that prefixes every message with `[tag]`, so that lines of the nemesis and of the workload can be told apart
 * in a shared log file. Tags nest: `withTag(withTag(l, 'a'), 'b')` writes `[a] [b] ...`.
 */
export function withTag(logger: Logger, tag: string): Logger {
  const t = (message: string) => `[${tag}] ${message}`
  return {
    print: (message, criticality) => logger.print(t(message), criticality),
    info: (message, ...rest) => logger.info(t(message), ...rest),
    debug: (message, ...rest) => logger.debug(t(message), ...rest),
    warn: (message, ...rest) => logger.warn(t(message), ...rest),
    error: (message, err, ...rest) => logger.error(t(message), err, ...rest),
  }
}

/**
 * Creates a logger that writes to `logFile` (an existing file is replaced) and prints operator-facing lines, as well as
 * errors, to `uiStream`.
 */
export function createDefaultLogger(
  logFile: string,
  pickiness: Criticality,
  logLevel: Level = 'info',
  uiStream: NodeJS.WritableStream = process.stdout,
): Logger {
  if (!path.isAbsolute(logFile)) {
    throw new Error(`log file path must be absolute: ${logFile}`)
  }
  if ((fs.statSync(logFile, { throwIfNoEntry: false })?.size ?? 0) > 0) {
    fs.rmSync(logFile, { force: true })
  }

  const w = winston.createLogger({
    level: 'debug',
    levels: { error: 0, warn: 1, info: 2, debug: 3 } satisfies Record<Level, number>,
    transports: [
      new winston.transports.File({
        filename: logFile,
        level: logLevel,
        format: format.combine(format.timestamp(), format.errors({ stack: true }), toFileLine),
      }),
      new winston.transports.Stream({
        stream: uiStream,
        level: 'info',
        format: format.combine(format.errors({ stack: true }), uiOnly(), toUiLine),
      }),
    ],
  })

  return {
    print: (message, criticality = 'moderate') =>
      isPrintable(criticality, pickiness) ? w.info(message, { ui: true }) : w.info(message),
    info: (message, ...rest) => w.info(message, ...rest),
    debug: (message, ...rest) => w.debug(message, ...rest),
    warn: (message, ...rest) => w.warn(message, ...rest),
    error: (message, err, ...rest) => w.error(message, err, ...rest, { ui: true }),
  }
}

const OMITTED_FROM_DETAILS = ['level', 'message', 'timestamp', 'stack', 'ui']

function details(info: Record<string, unknown>): string | undefined {
  const rest = Object.fromEntries(Object.entries(info).filter(([k]) => !OMITTED_FROM_DETAILS.includes(k)))
  return Object.keys(rest).length === 0 ? undefined : jsonStringify(rest)
}

const spaced = (...tokens: unknown[]) =>
  tokens
    .flatMap(t => (typeof t === 'string' && t.trim() ? [t.trim()] : []))
    .join(' ')

// file: "<timestamp> [<level>] <message> <details> <stack>"
const toFileLine = format.printf(info =>
  spaced(info.timestamp, `[${info.level}]`, info.message, details(info), info.stack),
)

const uiOnly = format(info => (info.ui ? info : false))

const toUiLine = format.printf(info => spaced(info.message, info.stack))
