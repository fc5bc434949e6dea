import { Client, fail, InvokeResult, ok } from 'client-protocol'
import { Invocation, Key, RegisterValue } from 'core-types'
import { aTimeoutOf, failMe } from 'misc'

import { Network } from './network'

export interface MemoryClusterOptions {
  /**
   * Upper bound of the random delay added to every request, in milliseconds.
   */
  maxLatencyMs?: number
  random?: () => number
}

/**
 * A linearizable CAS register service living in the harness's own process. Every request takes effect atomically at a
 * single instant. A request issued on a node that cannot reach a majority of the cluster waits until it can, then takes
 * effect: if the client gave up on it in the meantime, its outcome was rightly unknown.
 */
export class MemoryRegisterCluster {
  private readonly registers = new Map<Key, RegisterValue>()

  constructor(readonly network: Network, private readonly options: MemoryClusterOptions = {}) {}

  get nodes() {
    return this.network.nodes
  }

  async execute(node: string, invocation: Invocation): Promise<InvokeResult> {
    await this.delay()
    await this.network.untilQuorate(node)
    const current = this.registers.get(invocation.key) ?? null
    if (invocation.f === 'read') {
      return ok(current)
    }
    if (invocation.f === 'write') {
      this.registers.set(invocation.key, invocation.value)
      return ok()
    }
    const [expected, replacement] = invocation.value
    if (current !== expected) {
      return fail()
    }
    this.registers.set(invocation.key, replacement)
    return ok()
  }

  valueOf(key: Key): RegisterValue {
    return this.registers.get(key) ?? null
  }

  private async delay() {
    const max = this.options.maxLatencyMs ?? 0
    if (max > 0) {
      const random = this.options.random ?? Math.random
      await aTimeoutOf(random() * max).hasPassed()
    }
  }
}

export class MemoryRegisterClient implements Client {
  private node: string | undefined

  constructor(private readonly cluster: MemoryRegisterCluster) {}

  async open(node: string) {
    if (!this.cluster.nodes.includes(node)) {
      throw new Error(`unknown node: ${node}`)
    }
    this.node = node
  }

  async setup() {}

  invoke(invocation: Invocation) {
    return this.cluster.execute(this.node ?? failMe('client is not open'), invocation)
  }

  async teardown() {}

  async close() {
    this.node = undefined
  }
}
