/**
 * Ordered Index Set
 *
 * Deduplicated set of handles from one collection, always iterated in handle
 * order. Sets are immutable: `union` returns a new set.
 */

import { HandleScopeError } from '../errors'
import type { CollectionScope, Idx } from './idx'

export class IdxSet<T> implements Iterable<Idx<T>> {
  private readonly members: Set<number>

  private constructor(
    /** Scope shared by every member, undefined for the empty set */
    readonly scope: CollectionScope | undefined,
    private readonly items: readonly Idx<T>[],
  ) {
    this.members = new Set(items.map((idx) => idx.index))
  }

  static empty<T>(): IdxSet<T> {
    return new IdxSet<T>(undefined, [])
  }

  static of<T>(...handles: Idx<T>[]): IdxSet<T> {
    return IdxSet.from(handles)
  }

  /**
   * Build a set from any handles of a single collection.
   * @throws HandleScopeError if the handles come from different collections
   */
  static from<T>(handles: Iterable<Idx<T>>): IdxSet<T> {
    let scope: CollectionScope | undefined
    const byIndex = new Map<number, Idx<T>>()
    for (const idx of handles) {
      scope = checkScope(scope, idx.scope)
      if (!byIndex.has(idx.index)) {
        byIndex.set(idx.index, idx)
      }
    }
    const items = [...byIndex.values()].sort((a, b) => a.compare(b))
    return new IdxSet(scope, items)
  }

  get size(): number {
    return this.items.length
  }

  isEmpty(): boolean {
    return this.items.length === 0
  }

  has(idx: Idx<T>): boolean {
    if (this.scope !== undefined && idx.scope !== this.scope) return false
    return this.members.has(idx.index)
  }

  union(other: IdxSet<T>): IdxSet<T> {
    if (other.isEmpty()) return this
    if (this.isEmpty()) return other
    return IdxSet.from([...this.items, ...other.items])
  }

  equals(other: IdxSet<T>): boolean {
    if (this.size !== other.size) return false
    if (this.isEmpty()) return true
    if (this.scope !== other.scope) return false
    return this.items.every((idx, i) => idx.index === other.items[i]?.index)
  }

  toArray(): Idx<T>[] {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<Idx<T>> {
    return this.items[Symbol.iterator]()
  }
}

/**
 * Merge a handle's scope into the scope seen so far.
 * @throws HandleScopeError when the scopes differ
 */
export function checkScope(
  current: CollectionScope | undefined,
  next: CollectionScope,
): CollectionScope {
  if (current !== undefined && current !== next) {
    throw new HandleScopeError(current.toString(), next.toString())
  }
  return next
}
