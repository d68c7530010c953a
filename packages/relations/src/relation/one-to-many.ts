/**
 * One-to-Many Relation
 *
 * Every "many" object references exactly one "one" object by id, e.g. each
 * stop point belongs to one stop area.
 */

import {
  IdxMap,
  IdxSet,
  type CollectionScope,
  type CollectionWithId,
  type Identified,
  type Idx,
} from '../collection'
import { ReferentialIntegrityError } from '../errors'
import { logger } from '../observability'
import { assertScope, getCorresponding } from './projection'
import type { ForeignKey, Relation, RelationStats } from './types'

export class OneToMany<T extends Identified, U extends Identified> implements Relation<T, U> {
  private constructor(
    readonly name: string,
    readonly fromScope: CollectionScope,
    readonly toScope: CollectionScope,
    /** Only parents with at least one child have an entry */
    private readonly oneToMany: IdxMap<T, IdxSet<U>>,
    /** Total over the "many" collection */
    private readonly manyToOne: IdxMap<U, Idx<T>>,
  ) {}

  /**
   * Index `many` by the parent each of its objects references.
   *
   * @param relationName - Used in diagnostics, e.g. "stop_areas_to_stop_points"
   * @param foreignKey - Reads the referenced "one" id from a "many" object
   * @throws ReferentialIntegrityError on the first id missing from `one`
   *
   * @example
   * ```typescript
   * const rel = OneToMany.create(stopAreas, stopPoints, 'stop_areas_to_stop_points', (sp) => sp.stopAreaId)
   * ```
   */
  static create<T extends Identified, U extends Identified>(
    one: CollectionWithId<T>,
    many: CollectionWithId<U>,
    relationName: string,
    foreignKey: ForeignKey<U>,
  ): OneToMany<T, U> {
    const children = new IdxMap<T, Idx<U>[]>()
    const manyToOne = new IdxMap<U, Idx<T>>()

    for (const [manyIdx, obj] of many) {
      const oneId = foreignKey(obj)
      const oneIdx = one.getIdx(oneId)
      if (!oneIdx) {
        logger.warn('relation.failed', { subject: relationName, message: `id=${oneId} not found` })
        throw new ReferentialIntegrityError(relationName, oneId)
      }
      manyToOne.set(manyIdx, oneIdx)
      children.getOrInsert(oneIdx, () => []).push(manyIdx)
    }

    const oneToMany = new IdxMap<T, IdxSet<U>>()
    for (const [oneIdx, handles] of children.entries()) {
      oneToMany.set(oneIdx, IdxSet.from(handles))
    }

    const relation = new OneToMany(relationName, one.scope, many.scope, oneToMany, manyToOne)
    logger.debug('relation.built', { subject: relationName, details: { ...relation.stats() } })
    return relation
  }

  getFrom(): IdxSet<T> {
    return IdxSet.from(this.oneToMany.keys())
  }

  getCorrespondingForward(from: IdxSet<T>): IdxSet<U> {
    return getCorresponding(this.oneToMany, from, this.fromScope)
  }

  getCorrespondingBackward(to: IdxSet<U>): IdxSet<T> {
    assertScope(this.toScope, to)
    const parents: Idx<T>[] = []
    for (const idx of to) {
      const parent = this.manyToOne.get(idx)
      if (parent) parents.push(parent)
    }
    return IdxSet.from(parents)
  }

  /**
   * Parent of a single "many" handle.
   */
  getOne(manyIdx: Idx<U>): Idx<T> | undefined {
    assertScope(this.toScope, IdxSet.of(manyIdx))
    return this.manyToOne.get(manyIdx)
  }

  stats(): RelationStats {
    return {
      kind: 'one-to-many',
      from: this.oneToMany.size,
      associations: this.manyToOne.size,
    }
  }
}
