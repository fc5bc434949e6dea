import { BackendName } from 'backends'
import * as fs from 'fs'
import { HarnessError } from 'harness-error'
import * as JsoncParser from 'jsonc-parser'
import { errorLike, Int } from 'misc'
import * as path from 'path'
import { z } from 'zod'

export const CONFIG_FILE = '.harness.jsonc'

/**
 * Settings that rarely change between runs. Read from `.harness.jsonc` in the working directory; command-line flags win.
 */
export const HarnessConfig = z
  .object({
    storeDir: z.string().default('store').describe('Directory under which runs are stored.'),
    timeUnitMs: z
      .number()
      .positive()
      .default(1000)
      .describe('Length of a time unit (the unit of --time-limit, --fault-window and --op-gen-rate), in milliseconds.'),
    invokeTimeoutUnits: z.number().positive().default(5).describe('Timeout of a single invocation, in time units.'),
    nodes: z.string().min(1).array().optional().describe('Nodes of the system under test.'),
    externalCheckerPath: z.string().optional().describe('Executable of the external checker.'),
    externalCheckerTimeoutUnits: z
      .number()
      .positive()
      .default(600)
      .describe('How long the external checker may run, in time units.'),
    faultStartCommand: z.string().optional().describe('Shell command that starts a fault (etcd backend).'),
    faultStopCommand: z.string().optional().describe('Shell command that stops a fault (etcd backend).'),
  })
  .strict()
export type HarnessConfig = z.infer<typeof HarnessConfig>

export function readConfigFile(dir: string): HarnessConfig {
  const p = path.join(dir, CONFIG_FILE)
  if (!fs.existsSync(p)) {
    return HarnessConfig.parse({})
  }
  try {
    const content = fs.readFileSync(p, 'utf-8')
    const errors: JsoncParser.ParseError[] = []
    const parsed = JsoncParser.parse(content, errors, { allowTrailingComma: true, allowEmptyContent: true })
    const e = errors.at(0)
    if (e) {
      throw new Error(`Bad format: ${JsoncParser.printParseErrorCode(e.error)} at position ${e.offset}`)
    }
    return HarnessConfig.parse(parsed ?? {})
  } catch (e) {
    throw new HarnessError(`could not read config file ${p} - ${errorLike(e).message}`, 'options')
  }
}

export const CONCURRENCY_PATTERN = /^[1-9]\d*n?$/

/**
 * The parameters of a single run.
 */
export const TestOptions = z.object({
  backend: BackendName,
  nodes: z.string().min(1).array().min(1),
  opGenRate: z.number().positive().default(10).describe('Invocations per lane per time unit.'),
  opsPerKey: z.number().int().positive().default(100).describe('Invocations per key (before jitter).'),
  conPerKey: z.number().int().positive().default(5).describe('Lanes that work on a key at the same time.'),
  concurrency: z
    .string()
    .regex(CONCURRENCY_PATTERN, 'must be a positive integer, optionally followed by "n"')
    .default('50')
    .describe('Total number of lanes. "3n" means three times the number of nodes.'),
  valueRange: z.number().int().positive().default(10).describe('Values are drawn from [0, valueRange).'),
  timeLimit: z.number().min(10).default(40).describe('Length of the run, in time units.'),
  faultWindow: z.number().positive().default(5).describe('Length of a fault, in time units.'),
  skipChecker: z.boolean().default(false),
  quorumRead: z.boolean().default(false),
  faultStartCommand: z.string().optional(),
  faultStopCommand: z.string().optional(),
  timeUnitMs: z.number().positive().default(1000),
  invokeTimeoutUnits: z.number().positive().default(5),
})
export type TestOptions = z.infer<typeof TestOptions>

export function parseTestOptions(input: unknown): TestOptions {
  const parsed = TestOptions.safeParse(input)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new HarnessError(`bad options: ${issues.join('; ')}`, 'options')
  }
  return parsed.data
}

/**
 * Resolves a concurrency spec: `"12"` is 12 lanes, `"3n"` is three lanes per node.
 */
export function resolveConcurrency(spec: string, nodeCount: number): Int {
  if (!CONCURRENCY_PATTERN.test(spec)) {
    throw new HarnessError(`bad concurrency: <${spec}>`, 'options')
  }
  return spec.endsWith('n') ? Int(Number(spec.slice(0, -1)) * nodeCount) : Int(spec)
}

export function testName(options: TestOptions): string {
  const parts = [
    options.backend,
    `r=${options.opGenRate}`,
    `o=${options.opsPerKey}`,
    `t=${options.conPerKey}`,
    `c=${options.concurrency}`,
    `v=${options.valueRange}`,
    `l=${options.timeLimit}`,
    `f=${options.faultWindow}`,
  ]
  if (options.backend === 'etcd') {
    parts.push(`q=${options.quorumRead}`)
  }
  return parts.join(' ')
}
