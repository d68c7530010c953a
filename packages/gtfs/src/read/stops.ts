/**
 * stops.txt → stop areas and stop points
 */

import { z } from "zod"
import { CollectionWithId, logger } from "@transit-model/relations"
import type { Code, StopArea, StopPoint } from "../objects"
import { resolveOptions, type ReaderOptionsInput } from "../options"
import { decimal, optionalInteger, optionalText, parseRows, requiredText, type Row } from "./rows"

export const STOP_CODE_KEY = "gtfs_stop_code"

export const stopRowSchema = z.object({
  stop_id: requiredText,
  stop_code: optionalText,
  stop_name: requiredText,
  stop_desc: optionalText,
  stop_lat: decimal,
  stop_lon: decimal,
  location_type: optionalInteger,
  parent_station: optionalText,
  stop_timezone: optionalText,
})

export type StopRow = z.output<typeof stopRowSchema>

function codesOf(stop: StopRow): Code[] {
  return stop.stop_code ? [[STOP_CODE_KEY, stop.stop_code]] : []
}

function toStopArea(stop: StopRow): StopArea {
  return {
    id: stop.stop_id,
    name: stop.stop_name,
    codes: codesOf(stop),
    coord: { lon: stop.stop_lon, lat: stop.stop_lat },
    timezone: stop.stop_timezone,
    visible: true,
  }
}

function toStopPoint(stop: StopRow, stopAreaId: string): StopPoint {
  return {
    id: stop.stop_id,
    name: stop.stop_name,
    codes: codesOf(stop),
    coord: { lon: stop.stop_lon, lat: stop.stop_lat },
    stopAreaId,
    timezone: stop.stop_timezone,
    visible: true,
  }
}

/**
 * Split stops by `location_type`: 0 (or empty) is a stop point, 1 a stop area,
 * anything else is skipped. A stop point without `parent_station` gets its own
 * generated stop area, which carries no stop code.
 */
export function readStops(
  rows: Iterable<Row>,
  options?: ReaderOptionsInput,
): { stopAreas: CollectionWithId<StopArea>; stopPoints: CollectionWithId<StopPoint> } {
  const { stopAreaPrefix } = resolveOptions(options)
  const stops = parseRows("stops.txt", stopRowSchema, rows)

  const stopAreas: StopArea[] = []
  const stopPoints: StopPoint[] = []
  for (const stop of stops) {
    switch (stop.location_type ?? 0) {
      case 0: {
        let parent = stop.parent_station
        if (parent === undefined) {
          parent = `${stopAreaPrefix}${stop.stop_id}`
          stopAreas.push({ ...toStopArea(stop), id: parent, codes: [] })
        }
        stopPoints.push(toStopPoint(stop, parent))
        break
      }
      case 1:
        stopAreas.push(toStopArea(stop))
        break
      default:
        logger.debug("stop.skipped", {
          subject: stop.stop_id,
          details: { locationType: stop.location_type },
        })
    }
  }

  return {
    stopAreas: new CollectionWithId(stopAreas, "stop_areas"),
    stopPoints: new CollectionWithId(stopPoints, "stop_points"),
  }
}
