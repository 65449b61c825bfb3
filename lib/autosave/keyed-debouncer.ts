/**
 * Keyed Debouncer
 *
 * Map of key -> pending timer. Scheduling a key cancels its previous timer before
 * installing the new one, and a cancelled timer never fires.
 */

interface PendingEntry<V> {
  handle: ReturnType<typeof setTimeout>
  token: number
  value: V
}

export type DebounceCallback<K, V> = (key: K, value: V) => void

export class KeyedDebouncer<K, V> {
  private readonly pending = new Map<K, PendingEntry<V>>()
  private nextToken = 0

  constructor(
    private readonly delayMs: number,
    private readonly onFire: DebounceCallback<K, V>
  ) {}

  /** (Re)start the quiet period for `key`, remembering the latest value */
  schedule(key: K, value: V): void {
    this.cancel(key)

    const token = ++this.nextToken
    const handle = setTimeout(() => {
      const entry = this.pending.get(key)
      // A superseded timer that slipped through clearTimeout must not fire
      if (!entry || entry.token !== token) return
      this.pending.delete(key)
      this.onFire(key, entry.value)
    }, this.delayMs)

    this.pending.set(key, { handle, token, value })
  }

  cancel(key: K): boolean {
    const entry = this.pending.get(key)
    if (!entry) return false
    clearTimeout(entry.handle)
    this.pending.delete(key)
    return true
  }

  /** Fire `key` now if it is pending */
  flush(key: K): boolean {
    const entry = this.pending.get(key)
    if (!entry) return false
    clearTimeout(entry.handle)
    this.pending.delete(key)
    this.onFire(key, entry.value)
    return true
  }

  flushAll(): void {
    for (const key of Array.from(this.pending.keys())) {
      this.flush(key)
    }
  }

  cancelAll(): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.handle)
    }
    this.pending.clear()
  }

  isPending(key: K): boolean {
    return this.pending.has(key)
  }

  get size(): number {
    return this.pending.size
  }
}
