/**
 * Projection through handle-keyed adjacency maps
 */

import { IdxSet, type CollectionScope, type Idx, type IdxMap } from '../collection'
import { HandleScopeError } from '../errors'

/**
 * Union of `map[idx]` for every handle of `from`.
 *
 * Handles with no entry contribute nothing: a missing association is an
 * empty result, not an error.
 *
 * @throws HandleScopeError if `from` was drawn from a collection other than `scope`
 */
export function getCorresponding<T, U>(
  map: IdxMap<T, IdxSet<U>>,
  from: IdxSet<T>,
  scope: CollectionScope | undefined = map.scope,
): IdxSet<U> {
  assertScope(scope, from)
  const targets: Idx<U>[] = []
  for (const idx of from) {
    const mapped = map.get(idx)
    if (mapped) {
      targets.push(...mapped)
    }
  }
  return IdxSet.from(targets)
}

/**
 * Reject an index set drawn from a collection other than `expected`.
 * An unknown expected scope or an empty set always passes.
 */
export function assertScope<T>(expected: CollectionScope | undefined, set: IdxSet<T>): void {
  if (expected !== undefined && set.scope !== undefined && expected !== set.scope) {
    throw new HandleScopeError(expected.toString(), set.scope.toString())
  }
}
