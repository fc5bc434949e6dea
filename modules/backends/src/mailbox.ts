import { Client, fail, InvokeResult, ok } from 'client-protocol'
import { Invocation, Key } from 'core-types'
import { errorLike, failMe, mustGet } from 'misc'
import { z } from 'zod'

import { Network } from './network'

const StateMessage = z.array(z.tuple([z.number().int(), z.number().int()]))

export function queueName(producer: string, consumer: string) {
  return `q-${producer}-${consumer}`
}

export interface MailboxBrokerOptions {
  /**
   * A publish to a queue that already holds this many messages is rejected (nacked).
   */
  maxQueueLength?: number
}

/**
 * An in-process message broker with durable, named FIFO queues. Publishing to, or taking from, a queue requires the
 * two ends of the queue to be connected; while they are not, the request waits.
 */
export class MailboxBroker {
  private readonly queues = new Map<string, string[]>()

  constructor(readonly network: Network, private readonly options: MailboxBrokerOptions = {}) {}

  declare(producer: string, consumer: string) {
    const name = queueName(producer, consumer)
    if (!this.queues.has(name)) {
      this.queues.set(name, [])
    }
  }

  purge(producer: string, consumer: string) {
    this.queue(producer, consumer).length = 0
  }

  /**
   * Resolves to true once the message is stored (acked), to false if the broker rejected it (nacked).
   */
  async publish(producer: string, consumer: string, message: string): Promise<boolean> {
    const q = this.queue(producer, consumer)
    await this.network.untilConnected(producer, consumer)
    if (q.length >= (this.options.maxQueueLength ?? 1000)) {
      return false
    }
    q.push(message)
    return true
  }

  /**
   * Takes the oldest message of a queue, if there is one.
   */
  async get(producer: string, consumer: string): Promise<string | undefined> {
    const q = this.queue(producer, consumer)
    await this.network.untilConnected(producer, consumer)
    return q.shift()
  }

  depth(producer: string, consumer: string): number {
    return this.queue(producer, consumer).length
  }

  private queue(producer: string, consumer: string) {
    return mustGet(this.queues, queueName(producer, consumer), 'queue')
  }
}

/**
 * A register client on top of a message broker. The client keeps a local view of all registers: it replaces the view
 * with a state pulled from one of its inbound queues, and pushes the updated view to one of its outbound queues (peers
 * picked at random). A cas is a pull, a local compare, and a conditional push; there is no atomicity across the three,
 * so this backend is not expected to be linearizable.
 */
export class MailboxClient implements Client {
  private node: string | undefined
  private peers: string[] = []
  private state = new Map<Key, number>()
  private pending: Promise<unknown> = Promise.resolve()

  constructor(private readonly broker: MailboxBroker, private readonly random: () => number = Math.random) {}

  async open(node: string) {
    const nodes = this.broker.network.nodes
    if (!nodes.includes(node)) {
      throw new Error(`unknown node: ${node}`)
    }
    this.node = node
    this.peers = nodes.filter(n => n !== node)
    if (this.peers.length === 0) {
      throw new Error(`node ${node} has no peers`)
    }
    this.state = new Map()
  }

  async setup() {
    const nodes = this.broker.network.nodes
    for (const a of nodes) {
      for (const b of nodes) {
        if (a !== b) {
          this.broker.declare(a, b)
        }
      }
    }
  }

  /**
   * Invocations run one after the other: one that timed out on the caller's side keeps its place, and the next starts
   * from the view it leaves behind.
   */
  invoke(invocation: Invocation): Promise<InvokeResult> {
    const ret = this.pending.then(() => this.invokeNow(invocation))
    // ordering only; the outcome (or error) reaches the caller through `ret`
    this.pending = ret.then(
      () => undefined,
      () => undefined,
    )
    return ret
  }

  private async invokeNow(invocation: Invocation): Promise<InvokeResult> {
    if (invocation.f === 'read') {
      const pulled = await this.pull()
      return pulled ? fail(pulled) : ok(this.state.get(invocation.key) ?? null)
    }
    if (invocation.f === 'write') {
      return this.push(invocation.key, invocation.value)
    }
    const pulled = await this.pull()
    if (pulled) {
      return fail(pulled)
    }
    const [expected, replacement] = invocation.value
    if ((this.state.get(invocation.key) ?? null) !== expected) {
      return fail()
    }
    return this.push(invocation.key, replacement)
  }

  async teardown() {
    const nodes = this.broker.network.nodes
    for (const a of nodes) {
      for (const b of nodes) {
        if (a !== b) {
          this.broker.purge(a, b)
        }
      }
    }
  }

  async close() {
    this.node = undefined
  }

  private randomPeer() {
    return this.peers[Math.min(this.peers.length - 1, Math.floor(this.random() * this.peers.length))]
  }

  /**
   * Replaces the local view with the oldest state waiting in a random inbound queue (an empty queue leaves the view as
   * is). Resolves to an error message if the pull failed.
   */
  private async pull(): Promise<string | undefined> {
    const me = this.node ?? failMe('client is not open')
    try {
      const message = await this.broker.get(this.randomPeer(), me)
      if (message !== undefined) {
        this.state = new Map(StateMessage.parse(JSON.parse(message)))
      }
      return undefined
    } catch (e) {
      return errorLike(e).message ?? 'pull failed'
    }
  }

  private async push(key: Key, value: number): Promise<InvokeResult> {
    const me = this.node ?? failMe('client is not open')
    const next = new Map(this.state)
    next.set(key, value)
    const acked = await this.broker.publish(me, this.randomPeer(), JSON.stringify([...next.entries()]))
    if (!acked) {
      return fail('nack')
    }
    this.state = next
    return ok()
  }
}
