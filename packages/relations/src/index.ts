/**
 * Transit Model Relations - arena collections and composable relations
 *
 * Objects live in build-once collections and are referred to by handles.
 * Relations between collections are handle-indexed maps that can be queried
 * in both directions and composed into multi-hop relations.
 *
 * @example
 * ```typescript
 * import { CollectionWithId, OneToMany, ManyToMany } from '@transit-model/relations';
 *
 * const networks = new CollectionWithId([{ id: 'N1' }], 'networks');
 * const lines = new CollectionWithId([{ id: 'L1', networkId: 'N1' }], 'lines');
 * const routes = new CollectionWithId([{ id: 'R1', lineId: 'L1' }], 'routes');
 *
 * const networksToLines = OneToMany.create(networks, lines, 'networks_to_lines', (l) => l.networkId);
 * const linesToRoutes = OneToMany.create(lines, routes, 'lines_to_routes', (r) => r.lineId);
 * const networksToRoutes = ManyToMany.fromRelationsChain(networksToLines, linesToRoutes);
 *
 * const reachable = networksToRoutes.getCorrespondingForward(networks.indexes());
 * routes.idsOf(reachable); // ['R1']
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// COLLECTIONS
// =============================================================================

export { CollectionWithId, CollectionScope, Idx, IdxSet, IdxMap } from './collection'
export type { Identified } from './collection'

// =============================================================================
// RELATIONS
// =============================================================================

export { OneToMany, ManyToMany, getCorresponding, assertScope } from './relation'
export type { Relation, ForeignKey, RelationStats, ForwardEntries, RelationScopes } from './relation'

// =============================================================================
// ERRORS
// =============================================================================

export {
  TransitModelError,
  ReferentialIntegrityError,
  DuplicateIdentifierError,
  HandleScopeError,
  HandleRangeError,
  ConfigError,
} from './errors'

// =============================================================================
// CONFIGURATION & LOGGING
// =============================================================================

export { loadConfig, loadConfigOrDefault, defaultConfig, envSchema, LOG_LEVELS } from './config'
export type { TransitModelConfig, LogLevel } from './config'
export { Logger, logger } from './observability'
export type { LogEntry } from './observability'
