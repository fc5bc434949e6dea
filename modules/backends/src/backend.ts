import { ClientFactory } from 'client-protocol'
import { Logger } from 'logger'
import { CommandFaultInjector, FaultCommands, FaultInjector, NoopFaultInjector } from 'nemesis'
import { z } from 'zod'

import { EtcdClient } from './etcd-client'
import { MailboxBroker, MailboxClient } from './mailbox'
import { MemoryRegisterClient, MemoryRegisterCluster } from './memory-register'
import { Network } from './network'
import { SimulatedPartition } from './simulated-partition'

export const BackendName = z.enum(['memory', 'mailbox', 'etcd'])
export type BackendName = z.infer<typeof BackendName>

export interface BackendOptions {
  nodes: readonly string[]
  quorumRead: boolean
  requestTimeoutMs: number
  faultCommands?: FaultCommands
  random?: () => number
}

/**
 * What a run needs from a backend: a way to create one client per worker, and the fault injector to hand to the
 * nemesis.
 */
export interface Deployment {
  clientFactory: ClientFactory
  faultInjector: FaultInjector
}

export interface Backend {
  name: BackendName
  description: string
  defaultNodes: readonly string[]
  deploy(options: BackendOptions, logger: Logger): Deployment
}

const FIVE_NODES = ['n1', 'n2', 'n3', 'n4', 'n5']

const memory: Backend = {
  name: 'memory',
  description: 'in-process linearizable register cluster',
  defaultNodes: FIVE_NODES,
  deploy(options) {
    const network = new Network(options.nodes)
    const cluster = new MemoryRegisterCluster(network, { maxLatencyMs: 1, random: options.random })
    return {
      clientFactory: () => new MemoryRegisterClient(cluster),
      faultInjector: new SimulatedPartition(network, options.random),
    }
  },
}

const mailbox: Backend = {
  name: 'mailbox',
  description: 'in-process broker with per-pair mailboxes (pull/push)',
  defaultNodes: FIVE_NODES,
  deploy(options) {
    const network = new Network(options.nodes)
    const broker = new MailboxBroker(network)
    return {
      clientFactory: () => new MailboxClient(broker, options.random),
      faultInjector: new SimulatedPartition(network, options.random),
    }
  },
}

const etcd: Backend = {
  name: 'etcd',
  description: 'etcd v2 keys API over HTTP',
  defaultNodes: FIVE_NODES,
  deploy(options, logger) {
    const faultInjector = options.faultCommands
      ? new CommandFaultInjector(options.faultCommands, logger)
      : new NoopFaultInjector()
    if (!options.faultCommands) {
      logger.print('etcd: no fault commands were given, the nemesis will not inject faults', 'moderate')
    }
    return {
      clientFactory: () =>
        new EtcdClient({ quorumRead: options.quorumRead, requestTimeoutMs: options.requestTimeoutMs }),
      faultInjector,
    }
  },
}

const backends: Record<BackendName, Backend> = { memory, mailbox, etcd }

export function getBackend(name: BackendName): Backend {
  return backends[name]
}

export function allBackends(): Backend[] {
  return BackendName.options.map(getBackend)
}
