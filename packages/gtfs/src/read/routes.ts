/**
 * routes.txt + trips.txt → modes, lines and routes
 *
 * GTFS routes sharing an agency and a displayed name are merged into one line.
 * Each GTFS route then yields one route per direction its trips run in.
 */

import { z } from "zod"
import { CollectionWithId, logger } from "@transit-model/relations"
import type { CommercialMode, DirectionType, Line, PhysicalMode, Route } from "../objects"
import { resolveOptions, type ReaderOptionsInput } from "../options"
import { commercialModeOf, normalizeRouteType, physicalModeOf } from "./modes"
import {
  optionalColor,
  optionalInteger,
  optionalText,
  parseRows,
  requiredText,
  textOrEmpty,
  type Row,
} from "./rows"

// =============================================================================
// ROW SCHEMAS
// =============================================================================

export const routeRowSchema = z.object({
  route_id: requiredText,
  agency_id: optionalText,
  route_short_name: textOrEmpty,
  route_long_name: textOrEmpty,
  route_desc: optionalText,
  route_type: z.preprocess(
    (value) => (typeof value === "string" ? value.trim() : value),
    z.string().regex(/^\d+$/, "Expected an integer").transform(Number),
  ),
  route_url: optionalText,
  route_color: optionalColor,
  route_text_color: optionalColor,
  route_sort_order: optionalInteger,
})

export type RouteRow = z.output<typeof routeRowSchema>

export const tripRowSchema = z.object({
  trip_id: requiredText,
  route_id: requiredText,
  service_id: requiredText,
  trip_headsign: optionalText,
  trip_short_name: optionalText,
  direction_id: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.enum(["0", "1"]).default("0"),
  ),
  block_id: optionalText,
  shape_id: optionalText,
})

export type TripRow = z.output<typeof tripRowSchema>

// =============================================================================
// GROUPING
// =============================================================================

const DIRECTIONS: Record<TripRow["direction_id"], DirectionType> = {
  "0": "forward",
  "1": "backward",
}

interface LineGroup {
  /** Route with the smallest id, giving its id and attributes to the line */
  representative: RouteRow
  routes: RouteRow[]
}

function lineKey(route: RouteRow): string {
  const name = route.route_short_name !== "" ? route.route_short_name : route.route_long_name
  return JSON.stringify([route.agency_id ?? null, name])
}

function groupLines(routes: RouteRow[]): LineGroup[] {
  const groups = new Map<string, LineGroup>()
  for (const route of routes) {
    const key = lineKey(route)
    const group = groups.get(key)
    if (!group) {
      groups.set(key, { representative: route, routes: [route] })
      continue
    }
    group.routes.push(route)
    if (route.route_id < group.representative.route_id) {
      group.representative = route
    }
  }
  return [...groups.values()]
}

function directionsByRoute(trips: TripRow[]): Map<string, Set<DirectionType>> {
  const directions = new Map<string, Set<DirectionType>>()
  for (const trip of trips) {
    let set = directions.get(trip.route_id)
    if (!set) {
      set = new Set()
      directions.set(trip.route_id, set)
    }
    set.add(DIRECTIONS[trip.direction_id])
  }
  return directions
}

// =============================================================================
// READER
// =============================================================================

export interface RouteCollections {
  commercialModes: CollectionWithId<CommercialMode>
  physicalModes: CollectionWithId<PhysicalMode>
  lines: CollectionWithId<Line>
  routes: CollectionWithId<Route>
}

/**
 * Build modes, lines and routes.
 *
 * A line is only created for groups where at least one route has trips.
 * Modes are listed in order of first appearance; route types sharing a
 * physical mode produce it once.
 */
export function readRoutes(
  routeRows: Iterable<Row>,
  tripRows: Iterable<Row>,
  options?: ReaderOptionsInput,
): RouteCollections {
  const { defaultAgencyId } = resolveOptions(options)
  const gtfsRoutes = parseRows("routes.txt", routeRowSchema, routeRows).map((route) => ({
    ...route,
    route_type: normalizeRouteType(route.route_type, route.route_id),
  }))
  const directions = directionsByRoute(parseRows("trips.txt", tripRowSchema, tripRows))

  const commercialModes = new Map<string, CommercialMode>()
  const physicalModes = new Map<string, PhysicalMode>()
  for (const route of gtfsRoutes) {
    const commercial = commercialModeOf(route.route_type)
    const physical = physicalModeOf(route.route_type)
    if (!commercialModes.has(commercial.id)) commercialModes.set(commercial.id, commercial)
    if (!physicalModes.has(physical.id)) physicalModes.set(physical.id, physical)
  }

  const lines: Line[] = []
  const routes: Route[] = []
  for (const { representative, routes: members } of groupLines(gtfsRoutes)) {
    if (members.some((route) => directions.has(route.route_id))) {
      lines.push({
        id: representative.route_id,
        code: representative.route_short_name !== "" ? representative.route_short_name : undefined,
        name: representative.route_long_name,
        color: representative.route_color,
        textColor: representative.route_text_color,
        sortOrder: representative.route_sort_order,
        networkId: representative.agency_id ?? defaultAgencyId,
        commercialModeId: String(representative.route_type),
      })
    }

    for (const route of members) {
      const routeDirections = directions.get(route.route_id)
      if (!routeDirections) {
        logger.warn("route.without_trips", { subject: route.route_id, message: "no trip found for route" })
        continue
      }
      for (const direction of ["forward", "backward"] as const) {
        if (!routeDirections.has(direction)) continue
        routes.push({
          id: direction === "forward" ? route.route_id : `${route.route_id}_R`,
          name: route.route_long_name,
          directionType: direction,
          lineId: representative.route_id,
        })
      }
    }
  }

  return {
    commercialModes: new CollectionWithId([...commercialModes.values()], "commercial_modes"),
    physicalModes: new CollectionWithId([...physicalModes.values()], "physical_modes"),
    lines: new CollectionWithId(lines, "lines"),
    routes: new CollectionWithId(routes, "routes"),
  }
}
