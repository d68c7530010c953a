/**
 * GTFS route types and the modes derived from them
 */

import { logger } from "@transit-model/relations"
import type { CommercialMode, PhysicalMode } from "../objects"

export const BUS_ROUTE_TYPE = 3

const COMMERCIAL_MODE_NAMES: Record<number, string> = {
  0: "Tram, Streetcar, Light rail",
  1: "Subway, Metro",
  2: "Rail",
  3: "Bus",
  4: "Ferry",
  5: "Cable car",
  6: "Gondola, Suspended cable car",
  7: "Funicular",
}

const BUS_PHYSICAL_MODE: PhysicalMode = { id: "Bus", name: "Bus" }

const PHYSICAL_MODES: Record<number, PhysicalMode> = {
  0: { id: "RailShuttle", name: "Rail Shuttle" },
  1: { id: "Metro", name: "Metro" },
  2: { id: "Train", name: "Train" },
  3: BUS_PHYSICAL_MODE,
  4: { id: "Ferry", name: "Ferry" },
  5: { id: "Funicular", name: "Funicular" },
  6: { id: "Funicular", name: "Funicular" },
  7: { id: "Funicular", name: "Funicular" },
}

/**
 * Route types 8 to 98 are not defined and fall back to bus.
 * 99 and above are kept as extended types.
 */
export function normalizeRouteType(routeType: number, routeId?: string): number {
  if (routeType > 7 && routeType < 99) {
    logger.warn("route.type.illegal", {
      subject: routeId,
      message: `illegal route_type: '${routeType}', using '${BUS_ROUTE_TYPE}' as fallback`,
    })
    return BUS_ROUTE_TYPE
  }
  return routeType
}

export function commercialModeOf(routeType: number): CommercialMode {
  return {
    id: String(routeType),
    name: COMMERCIAL_MODE_NAMES[routeType] ?? "Unknown Mode",
  }
}

export function physicalModeOf(routeType: number): PhysicalMode {
  return { ...(PHYSICAL_MODES[routeType] ?? BUS_PHYSICAL_MODE) }
}
