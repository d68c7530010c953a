/**
 * Relation Contract
 */

import type { CollectionScope, IdxSet } from '../collection'

/**
 * Directed association between the handles of two collections.
 *
 * Implementations are immutable once built: every method is a pure read.
 *
 * @template From - Object type on the source side
 * @template To - Object type on the target side
 */
export interface Relation<From, To> {
  /** Collection the source handles are drawn from, when known */
  readonly fromScope: CollectionScope | undefined

  /** Collection the target handles are drawn from, when known */
  readonly toScope: CollectionScope | undefined

  /** Every source handle taking part in at least one association */
  getFrom(): IdxSet<From>

  /** Union of the targets associated with the given sources */
  getCorrespondingForward(from: IdxSet<From>): IdxSet<To>

  /** Union of the sources associated with the given targets */
  getCorrespondingBackward(to: IdxSet<To>): IdxSet<From>
}

/**
 * Reads the id of the "one" object referenced by a "many" object.
 */
export type ForeignKey<U> = (item: U) => string

/**
 * Counters reported when a relation is built.
 */
export interface RelationStats {
  kind: 'one-to-many' | 'many-to-many'
  from: number
  associations: number
}
