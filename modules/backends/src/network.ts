/**
 * An in-process model of the network between the nodes of a simulated cluster. The network is either fully connected
 * or split into disjoint groups; messages flow only within a group.
 */
export class Network {
  private groupOf: ReadonlyMap<string, number> | undefined
  private healed: Promise<void> = Promise.resolve()
  private resolveHealed: () => void = () => {}

  constructor(readonly nodes: readonly string[]) {}

  get partitioned() {
    return this.groupOf !== undefined
  }

  partition(groups: readonly (readonly string[])[]) {
    const groupOf = new Map<string, number>()
    groups.forEach((g, i) => g.forEach(n => groupOf.set(n, i)))
    for (const n of this.nodes) {
      if (!groupOf.has(n)) {
        throw new Error(`node ${n} is missing from the partition`)
      }
    }
    if (!this.groupOf) {
      this.healed = new Promise<void>(resolve => {
        this.resolveHealed = resolve
      })
    }
    this.groupOf = groupOf
  }

  heal() {
    this.groupOf = undefined
    this.resolveHealed()
  }

  connected(a: string, b: string): boolean {
    return !this.groupOf || this.groupOf.get(a) === this.groupOf.get(b)
  }

  /**
   * Whether `node` can reach a strict majority of the cluster (itself included).
   */
  quorate(node: string): boolean {
    const reachable = this.nodes.filter(n => this.connected(node, n)).length
    return reachable * 2 > this.nodes.length
  }

  async untilConnected(a: string, b: string): Promise<void> {
    while (!this.connected(a, b)) {
      await this.healed
    }
  }

  async untilQuorate(node: string): Promise<void> {
    while (!this.quorate(node)) {
      await this.healed
    }
  }
}
