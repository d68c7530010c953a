/**
 * Transit Model
 *
 * Finalized collections plus the relations between them. Everything is built
 * once in `Model.build` and read-only afterwards.
 */

import { ManyToMany, OneToMany, logger, type CollectionWithId } from "@transit-model/relations"
import type {
  CommercialMode,
  Company,
  Contributor,
  Dataset,
  Line,
  Network,
  PhysicalMode,
  Route,
  StopArea,
  StopPoint,
} from "./objects"
import { resolveOptions, type ReaderOptionsInput } from "./options"
import { addPrefix } from "./prefix"
import { readAgencies, readConfig, readRoutes, readStops, type Row } from "./read"

export interface Collections {
  networks: CollectionWithId<Network>
  companies: CollectionWithId<Company>
  stopAreas: CollectionWithId<StopArea>
  stopPoints: CollectionWithId<StopPoint>
  commercialModes: CollectionWithId<CommercialMode>
  physicalModes: CollectionWithId<PhysicalMode>
  lines: CollectionWithId<Line>
  routes: CollectionWithId<Route>
  contributors: CollectionWithId<Contributor>
  datasets: CollectionWithId<Dataset>
}

/**
 * Raw GTFS tables, one record per row.
 */
export interface GtfsTables {
  agency: Iterable<Row>
  stops: Iterable<Row>
  routes: Iterable<Row>
  trips: Iterable<Row>
  /** Contributor/dataset configuration, see `datasetConfigSchema` */
  config?: unknown
}

/**
 * Read every table into collections, prefixing ids when `options.prefix` is set.
 * @throws InvalidRowError, InvalidDatasetConfigError or DuplicateIdentifierError
 */
export function readCollections(tables: GtfsTables, options?: ReaderOptionsInput): Collections {
  const collections: Collections = {
    ...readConfig(tables.config, options),
    ...readAgencies(tables.agency, options),
    ...readStops(tables.stops, options),
    ...readRoutes(tables.routes, tables.trips, options),
  }
  const { prefix } = resolveOptions(options)
  return prefix === undefined ? collections : addPrefix(collections, prefix)
}

export class Model {
  readonly networksToLines: OneToMany<Network, Line>
  readonly commercialModesToLines: OneToMany<CommercialMode, Line>
  readonly linesToRoutes: OneToMany<Line, Route>
  readonly stopAreasToStopPoints: OneToMany<StopArea, StopPoint>
  readonly networksToRoutes: ManyToMany<Network, Route>
  readonly commercialModesToNetworks: ManyToMany<CommercialMode, Network>
  readonly contributorsToDatasets: OneToMany<Contributor, Dataset>

  private constructor(readonly collections: Readonly<Collections>) {
    const c = collections
    this.networksToLines = OneToMany.create(c.networks, c.lines, "networks_to_lines", (l) => l.networkId)
    this.commercialModesToLines = OneToMany.create(
      c.commercialModes,
      c.lines,
      "commercial_modes_to_lines",
      (l) => l.commercialModeId,
    )
    this.linesToRoutes = OneToMany.create(c.lines, c.routes, "lines_to_routes", (r) => r.lineId)
    this.stopAreasToStopPoints = OneToMany.create(
      c.stopAreas,
      c.stopPoints,
      "stop_areas_to_stop_points",
      (sp) => sp.stopAreaId,
    )
    this.networksToRoutes = ManyToMany.fromRelationsChain(
      this.networksToLines,
      this.linesToRoutes,
      "networks_to_routes",
    )
    this.commercialModesToNetworks = ManyToMany.fromRelationsSink(
      this.commercialModesToLines,
      this.networksToLines,
      "commercial_modes_to_networks",
    )
    this.contributorsToDatasets = OneToMany.create(
      c.contributors,
      c.datasets,
      "contributors_to_datasets",
      (d) => d.contributorId,
    )
  }

  /**
   * Index finalized collections.
   * @throws ReferentialIntegrityError if an object references a missing id
   */
  static build(collections: Collections): Model {
    const model = new Model({ ...collections })
    logger.info("model.built", {
      details: {
        networks: collections.networks.size,
        lines: collections.lines.size,
        routes: collections.routes.size,
        stopAreas: collections.stopAreas.size,
        stopPoints: collections.stopPoints.size,
      },
    })
    return model
  }

  /**
   * Read GTFS tables and index them.
   */
  static fromGtfs(tables: GtfsTables, options?: ReaderOptionsInput): Model {
    return Model.build(readCollections(tables, options))
  }

  /**
   * Ids of the routes run under the given networks.
   */
  routesOfNetworks(networkIds: Iterable<string>): string[] {
    const { networks, routes } = this.collections
    return routes.idsOf(this.networksToRoutes.getCorrespondingForward(networks.idxSetOf(networkIds)))
  }

  /**
   * Ids of the stop points under the given stop areas.
   */
  stopPointsOfStopAreas(stopAreaIds: Iterable<string>): string[] {
    const { stopAreas, stopPoints } = this.collections
    return stopPoints.idsOf(
      this.stopAreasToStopPoints.getCorrespondingForward(stopAreas.idxSetOf(stopAreaIds)),
    )
  }
}
