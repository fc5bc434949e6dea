import * as fse from 'fs-extra'
import { HarnessError } from 'harness-error'
import * as path from 'path'
import * as Tmp from 'tmp-promise'

import { CONFIG_FILE, parseTestOptions, readConfigFile, resolveConcurrency, testName } from '../src'

function catchError(f: () => unknown): unknown {
  try {
    f()
  } catch (e) {
    return e
  }
  throw new Error('expected an exception')
}

describe('harness-config', () => {
  describe('readConfigFile', () => {
    let tmp: Tmp.DirectoryResult
    beforeEach(async () => {
      tmp = await Tmp.dir({ unsafeCleanup: true })
    })
    afterEach(async () => {
      await tmp.cleanup()
    })

    test('defaults apply when there is no config file', () => {
      expect(readConfigFile(tmp.path)).toEqual({
        storeDir: 'store',
        timeUnitMs: 1000,
        invokeTimeoutUnits: 5,
        externalCheckerTimeoutUnits: 600,
      })
    })
    test('comments and trailing commas are allowed', async () => {
      await fse.writeFile(
        path.join(tmp.path, CONFIG_FILE),
        `{
          // where runs go
          "storeDir": "runs",
          "nodes": ["a", "b", "c"],
          "externalCheckerPath": "/opt/checker", /* no timeout override */
        }`,
      )
      expect(readConfigFile(tmp.path)).toEqual({
        storeDir: 'runs',
        timeUnitMs: 1000,
        invokeTimeoutUnits: 5,
        nodes: ['a', 'b', 'c'],
        externalCheckerPath: '/opt/checker',
        externalCheckerTimeoutUnits: 600,
      })
    })
    test('an unknown setting is an options error', async () => {
      await fse.writeFile(path.join(tmp.path, CONFIG_FILE), '{ "storDir": "runs" }')
      const e = catchError(() => readConfigFile(tmp.path))
      expect(e).toBeInstanceOf(HarnessError)
      expect(e).toMatchObject({ hint: 'options' })
      expect(String(e)).toContain(`could not read config file ${path.join(tmp.path, CONFIG_FILE)}`)
    })
    test('a syntax error is an options error', async () => {
      await fse.writeFile(path.join(tmp.path, CONFIG_FILE), '{ "storeDir": }')
      const e = catchError(() => readConfigFile(tmp.path))
      expect(e).toMatchObject({ hint: 'options' })
      expect(String(e)).toContain('Bad format: ValueExpected')
    })
  })

  describe('parseTestOptions', () => {
    test('fills in defaults', () => {
      expect(parseTestOptions({ backend: 'memory', nodes: ['n1'] })).toEqual({
        backend: 'memory',
        nodes: ['n1'],
        opGenRate: 10,
        opsPerKey: 100,
        conPerKey: 5,
        concurrency: '50',
        valueRange: 10,
        timeLimit: 40,
        faultWindow: 5,
        skipChecker: false,
        quorumRead: false,
        timeUnitMs: 1000,
        invokeTimeoutUnits: 5,
      })
    })
    test('reports every bad option', () => {
      const e = catchError(() =>
        parseTestOptions({ backend: 'memory', nodes: ['n1'], timeLimit: 5, concurrency: 'many' }),
      )
      expect(e).toMatchObject({ hint: 'options' })
      expect(String(e)).toEqual(
        'Error: bad options: concurrency: must be a positive integer, optionally followed by "n"; ' +
          'timeLimit: Number must be greater than or equal to 10',
      )
    })
    test('an unknown backend is rejected', () => {
      expect(() => parseTestOptions({ backend: 'redis', nodes: ['n1'] })).toThrow(/^bad options: backend: /)
    })
  })

  test('resolveConcurrency', () => {
    expect(resolveConcurrency('12', 5)).toEqual(12)
    expect(resolveConcurrency('3n', 5)).toEqual(15)
    expect(resolveConcurrency('1n', 3)).toEqual(3)
    expect(() => resolveConcurrency('0', 5)).toThrow('bad concurrency: <0>')
    expect(() => resolveConcurrency('n', 5)).toThrow('bad concurrency: <n>')
  })

  test('testName', () => {
    const options = parseTestOptions({ backend: 'memory', nodes: ['n1'] })
    expect(testName(options)).toEqual('memory r=10 o=100 t=5 c=50 v=10 l=40 f=5')
    expect(testName({ ...options, backend: 'etcd', quorumRead: true })).toEqual(
      'etcd r=10 o=100 t=5 c=50 v=10 l=40 f=5 q=true',
    )
  })
})
