import { FaultInjector } from 'nemesis'

import { Network } from './network'

export function shuffle<T>(items: readonly T[], random: () => number): T[] {
  const ret = [...items]
  for (let i = ret.length - 1; i > 0; --i) {
    const j = Math.floor(random() * (i + 1))
    const t = ret[i]
    ret[i] = ret[j]
    ret[j] = t
  }
  return ret
}

/**
 * Splits the nodes of an in-process network into two random halves (the first one being the smaller, so that with an
 * odd node count one side keeps a majority). `stop()` reconnects everything.
 */
export class SimulatedPartition implements FaultInjector {
  constructor(private readonly network: Network, private readonly random: () => number = Math.random) {}

  async setup(_nodes: readonly string[]) {
    this.network.heal()
  }

  async start() {
    const shuffled = shuffle(this.network.nodes, this.random)
    const cut = Math.floor(shuffled.length / 2)
    const minority = shuffled.slice(0, cut)
    const majority = shuffled.slice(cut)
    this.network.partition([minority, majority])
    return `${minority.join(' ')} | ${majority.join(' ')}`
  }

  async stop() {
    this.network.heal()
    return 'fully connected'
  }

  async teardown() {
    this.network.heal()
  }
}
