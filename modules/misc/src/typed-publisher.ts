type Handler<E> = (e: E) => void | Promise<void>

export interface Subscribable<T> {
  on<K extends keyof T>(k: K, subscriber: Handler<T[K]>): void
}

/**
 * A publish/subscribe hub whose event names and payload types are given by the record type `T`. `publish()` resolves
 * once every subscriber of that event has settled.
 */
export class TypedPublisher<T extends object> implements Subscribable<T> {
  private readonly subscribers: { [K in keyof T]?: Handler<T[K]>[] } = {}

  async publish<K extends keyof T>(k: K, e: T[K]): Promise<void> {
    const list = this.subscribers[k] ?? []
    await Promise.all(list.map(s => s(e)))
  }

  on<K extends keyof T>(k: K, subscriber: Handler<T[K]>): void {
    const list = this.subscribers[k] ?? []
    list.push(subscriber)
    this.subscribers[k] = list
  }

  /**
   * Returns a promise that resolves with the first event of kind `k` for which `predicate` returns true.
   */
  awaitFor<K extends keyof T>(k: K, predicate: (e: T[K]) => boolean): Promise<T[K]> {
    return new Promise<T[K]>(res => {
      let fired = false
      this.on(k, e => {
        if (fired || !predicate(e)) {
          return
        }
        fired = true
        res(e)
      })
    })
  }
}
