/**
 * Handle-keyed Map
 *
 * Map from handles of one collection to arbitrary values, keyed by handle
 * position so that distinct handle objects for the same slot collapse.
 * Iteration follows handle order.
 */

import type { CollectionScope, Idx } from './idx'
import { checkScope } from './idx-set'

export class IdxMap<K, V> {
  private readonly entriesByIndex = new Map<number, readonly [Idx<K>, V]>()
  private keyScope: CollectionScope | undefined
  private sorted: ReadonlyArray<readonly [Idx<K>, V]> | undefined

  /** @param keyScope - Collection the keys must belong to; taken from the first key when omitted */
  constructor(keyScope?: CollectionScope) {
    this.keyScope = keyScope
  }

  get scope(): CollectionScope | undefined {
    return this.keyScope
  }

  get size(): number {
    return this.entriesByIndex.size
  }

  get(idx: Idx<K>): V | undefined {
    if (idx.scope !== this.keyScope) return undefined
    return this.entriesByIndex.get(idx.index)?.[1]
  }

  has(idx: Idx<K>): boolean {
    return this.get(idx) !== undefined
  }

  /**
   * Insert or replace the value stored for a handle.
   * @throws HandleScopeError if the handle belongs to another collection
   */
  set(idx: Idx<K>, value: V): this {
    this.keyScope = checkScope(this.keyScope, idx.scope)
    const existing = this.entriesByIndex.get(idx.index)
    this.entriesByIndex.set(idx.index, [existing?.[0] ?? idx, value])
    this.sorted = undefined
    return this
  }

  /**
   * Get the value for a handle, inserting `init()` first when absent.
   */
  getOrInsert(idx: Idx<K>, init: () => V): V {
    const existing = this.get(idx)
    if (existing !== undefined) return existing
    const value = init()
    this.set(idx, value)
    return value
  }

  keys(): Idx<K>[] {
    return this.entries().map(([idx]) => idx)
  }

  entries(): ReadonlyArray<readonly [Idx<K>, V]> {
    if (!this.sorted) {
      this.sorted = Object.freeze([...this.entriesByIndex.values()].sort(([a], [b]) => a.compare(b)))
    }
    return this.sorted
  }
}
