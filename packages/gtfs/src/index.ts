/**
 * Transit Model GTFS - table ingestion and the indexed transit model
 *
 * @example
 * ```typescript
 * import { Model } from '@transit-model/gtfs';
 *
 * const model = Model.fromGtfs({
 *   agency: [{ agency_id: 'A1', agency_name: 'Metro Co', agency_url: 'http://example.com' }],
 *   stops: [{ stop_id: 'S1', stop_name: 'Central', stop_lat: '0.1', stop_lon: '1.2' }],
 *   routes: [{ route_id: 'R1', agency_id: 'A1', route_short_name: '1', route_type: '3' }],
 *   trips: [{ trip_id: 'T1', route_id: 'R1', service_id: 'weekdays' }],
 * });
 *
 * model.routesOfNetworks(['A1']); // ['R1']
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MODEL
// =============================================================================

export { Model, readCollections } from "./model"
export type { Collections, GtfsTables } from "./model"

// =============================================================================
// OBJECTS
// =============================================================================

export type {
  Code,
  Coord,
  Network,
  Company,
  StopArea,
  StopPoint,
  CommercialMode,
  PhysicalMode,
  Line,
  Route,
  DirectionType,
  Contributor,
  Dataset,
} from "./objects"

// =============================================================================
// PREFIX
// =============================================================================

export { addPrefix, prefixSchema } from "./prefix"

// =============================================================================
// READERS
// =============================================================================

export * from "./read"
export { readerOptionsSchema, resolveOptions } from "./options"
export type { ReaderOptions, ReaderOptionsInput } from "./options"
export { InvalidRowError, InvalidDatasetConfigError } from "./errors"
