/**
 * Indexed Collections
 *
 * Build-once arena of domain objects. Each object receives a handle equal to
 * its insertion position; handles stay valid for the collection's lifetime.
 */

import { DuplicateIdentifierError, HandleRangeError, HandleScopeError } from '../errors'
import { logger } from '../observability'
import { CollectionScope, Idx } from './idx'
import { IdxSet } from './idx-set'

/**
 * Objects stored in a `CollectionWithId` expose a stable external id.
 */
export interface Identified {
  readonly id: string
}

/**
 * Collection of objects with unique external ids.
 *
 * @example
 * ```typescript
 * const stopAreas = new CollectionWithId([{ id: 'SA1', name: 'Central' }], 'stop_areas')
 * const idx = stopAreas.getIdx('SA1')
 * if (idx) console.log(stopAreas.get(idx).name)
 * ```
 */
export class CollectionWithId<T extends Identified> implements Iterable<readonly [Idx<T>, T]> {
  readonly scope: CollectionScope
  private readonly objects: readonly T[]
  private readonly handles: readonly Idx<T>[]
  private readonly idToIdx = new Map<string, Idx<T>>()

  /**
   * @throws DuplicateIdentifierError if two objects share an id
   */
  constructor(objects: Iterable<T>, name = 'collection') {
    this.scope = new CollectionScope(name)
    this.objects = Object.freeze([...objects])
    this.handles = Object.freeze(this.objects.map((_, i) => new Idx<T>(this.scope, i)))

    this.objects.forEach((obj, i) => {
      if (this.idToIdx.has(obj.id)) {
        throw new DuplicateIdentifierError(name, obj.id)
      }
      const idx = this.handles[i]
      if (idx) this.idToIdx.set(obj.id, idx)
    })

    logger.debug('collection.built', { subject: name, details: { size: this.objects.length } })
  }

  static empty<T extends Identified>(name?: string): CollectionWithId<T> {
    return new CollectionWithId<T>([], name)
  }

  get name(): string {
    return this.scope.name
  }

  get size(): number {
    return this.objects.length
  }

  isEmpty(): boolean {
    return this.objects.length === 0
  }

  /**
   * Handle of the object with the given id, if any.
   */
  getIdx(id: string): Idx<T> | undefined {
    return this.idToIdx.get(id)
  }

  /**
   * Dereference a handle.
   * @throws HandleScopeError if the handle was issued by another collection
   * @throws HandleRangeError if the handle points past the last object
   */
  get(idx: Idx<T>): T {
    if (idx.scope !== this.scope) {
      throw new HandleScopeError(this.scope.toString(), idx.scope.toString())
    }
    const obj = this.objects[idx.index]
    if (obj === undefined) {
      throw new HandleRangeError(this.scope.toString(), idx.index, this.objects.length)
    }
    return obj
  }

  getById(id: string): T | undefined {
    const idx = this.idToIdx.get(id)
    return idx ? this.get(idx) : undefined
  }

  /**
   * Every handle of the collection, in order.
   */
  indexes(): IdxSet<T> {
    return IdxSet.from(this.handles)
  }

  /**
   * Handles for the given ids; unknown ids are skipped.
   */
  idxSetOf(ids: Iterable<string>): IdxSet<T> {
    const handles: Idx<T>[] = []
    for (const id of ids) {
      const idx = this.idToIdx.get(id)
      if (idx) handles.push(idx)
    }
    return IdxSet.from(handles)
  }

  /**
   * Ids of the objects behind a set of handles, in handle order.
   */
  idsOf(set: IdxSet<T>): string[] {
    return set.toArray().map((idx) => this.get(idx).id)
  }

  values(): T[] {
    return [...this.objects]
  }

  *entries(): IterableIterator<readonly [Idx<T>, T]> {
    for (const idx of this.handles) {
      yield [idx, this.get(idx)] as const
    }
  }

  [Symbol.iterator](): Iterator<readonly [Idx<T>, T]> {
    return this.entries()
  }
}
