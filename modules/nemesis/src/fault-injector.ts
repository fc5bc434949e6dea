/**
 * Induces (and heals) a fault in the system under test. `start()` and `stop()` resolve to a short, human-readable
 * description of what was done, which ends up as the value of the corresponding nemesis operation.
 */
export interface FaultInjector {
  setup(nodes: readonly string[]): Promise<void>
  start(): Promise<string>
  stop(): Promise<string>
  teardown(): Promise<void>
}

export class NoopFaultInjector implements FaultInjector {
  async setup(_nodes: readonly string[]) {}

  async start() {
    return 'noop'
  }

  async stop() {
    return 'noop'
  }

  async teardown() {}
}
