/**
 * Many-to-Many Relation
 *
 * Stores explicit forward and backward adjacency. Both maps are built together
 * from the forward associations and are exact inverses of each other.
 */

import { IdxMap, IdxSet, type CollectionScope, type Idx } from '../collection'
import { logger } from '../observability'
import { assertScope, getCorresponding } from './projection'
import type { Relation, RelationStats } from './types'

export type ForwardEntries<T, U> = Iterable<readonly [Idx<T>, IdxSet<U>]>

/**
 * Collections a relation's handles belong to. A side left out is taken from
 * the handles themselves, and stays unknown when there are none.
 */
export interface RelationScopes {
  from?: CollectionScope
  to?: CollectionScope
}

export class ManyToMany<T, U> implements Relation<T, U> {
  private constructor(
    readonly name: string,
    readonly fromScope: CollectionScope | undefined,
    readonly toScope: CollectionScope | undefined,
    private readonly forward: IdxMap<T, IdxSet<U>>,
    private readonly backward: IdxMap<U, IdxSet<T>>,
  ) {}

  /**
   * Build a relation from its forward associations.
   *
   * Entries sharing a source handle are merged and sources with no target are
   * dropped, so `getFrom()` only lists handles that reach something.
   *
   * @throws HandleScopeError if a handle belongs to a collection other than the given scopes
   */
  static fromForward<T, U>(
    forward: ForwardEntries<T, U>,
    name = 'many_to_many',
    scopes: RelationScopes = {},
  ): ManyToMany<T, U> {
    const merged = new IdxMap<T, IdxSet<U>>(scopes.from)
    for (const [fromIdx, targets] of forward) {
      if (targets.isEmpty()) continue
      assertScope(scopes.to, targets)
      merged.set(fromIdx, (merged.get(fromIdx) ?? IdxSet.empty<U>()).union(targets))
    }

    const sources = new IdxMap<U, Idx<T>[]>()
    for (const [fromIdx, targets] of merged.entries()) {
      for (const toIdx of targets) {
        sources.getOrInsert(toIdx, () => []).push(fromIdx)
      }
    }
    const backward = new IdxMap<U, IdxSet<T>>(scopes.to)
    for (const [toIdx, handles] of sources.entries()) {
      backward.set(toIdx, IdxSet.from(handles))
    }

    const relation = new ManyToMany(name, merged.scope, backward.scope, merged, backward)
    logger.debug('relation.built', { subject: name, details: { ...relation.stats() } })
    return relation
  }

  /**
   * Compose `r1: T → M` and `r2: M → U` into `T → U`.
   *
   * @example
   * ```typescript
   * // networks → lines → routes
   * const networksToRoutes = ManyToMany.fromRelationsChain(networksToLines, linesToRoutes)
   * ```
   */
  static fromRelationsChain<T, M, U>(
    r1: Relation<T, M>,
    r2: Relation<M, U>,
    name = 'chain',
  ): ManyToMany<T, U> {
    const forward: Array<readonly [Idx<T>, IdxSet<U>]> = []
    for (const idx of r1.getFrom()) {
      const mid = r1.getCorrespondingForward(IdxSet.of(idx))
      forward.push([idx, r2.getCorrespondingForward(mid)])
    }
    return ManyToMany.fromForward(forward, name, { from: r1.fromScope, to: r2.toScope })
  }

  /**
   * Compose `r1: T → M` and `r2: U → M` into `T → U`, joining two relations
   * that converge on the same intermediate collection.
   *
   * @example
   * ```typescript
   * // commercial modes → lines ← networks
   * const modesToNetworks = ManyToMany.fromRelationsSink(modesToLines, networksToLines)
   * ```
   */
  static fromRelationsSink<T, M, U>(
    r1: Relation<T, M>,
    r2: Relation<U, M>,
    name = 'sink',
  ): ManyToMany<T, U> {
    const forward: Array<readonly [Idx<T>, IdxSet<U>]> = []
    for (const idx of r1.getFrom()) {
      const mid = r1.getCorrespondingForward(IdxSet.of(idx))
      forward.push([idx, r2.getCorrespondingBackward(mid)])
    }
    return ManyToMany.fromForward(forward, name, { from: r1.fromScope, to: r2.fromScope })
  }

  getFrom(): IdxSet<T> {
    return IdxSet.from(this.forward.keys())
  }

  getCorrespondingForward(from: IdxSet<T>): IdxSet<U> {
    return getCorresponding(this.forward, from, this.fromScope)
  }

  getCorrespondingBackward(to: IdxSet<U>): IdxSet<T> {
    return getCorresponding(this.backward, to, this.toScope)
  }

  /** Forward adjacency in source handle order */
  forwardEntries(): ReadonlyArray<readonly [Idx<T>, IdxSet<U>]> {
    return this.forward.entries()
  }

  /** Backward adjacency in target handle order */
  backwardEntries(): ReadonlyArray<readonly [Idx<U>, IdxSet<T>]> {
    return this.backward.entries()
  }

  stats(): RelationStats {
    let associations = 0
    for (const [, targets] of this.forward.entries()) {
      associations += targets.size
    }
    return { kind: 'many-to-many', from: this.forward.size, associations }
  }
}
