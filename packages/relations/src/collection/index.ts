/**
 * Collection Module
 */

export { CollectionScope, Idx } from './idx'
export { IdxSet } from './idx-set'
export { IdxMap } from './idx-map'
export { CollectionWithId } from './collection'
export type { Identified } from './collection'
