/**
 * Relation Module
 */

export { OneToMany } from './one-to-many'
export { ManyToMany } from './many-to-many'
export type { ForwardEntries, RelationScopes } from './many-to-many'
export { getCorresponding, assertScope } from './projection'
export type { Relation, ForeignKey, RelationStats } from './types'
