import { CollectionWithId } from '../src'

export interface StopArea {
  id: string
  name: string
}

export interface StopPoint {
  id: string
  name: string
  stopAreaId: string
}

export function stopArea(id: string): StopArea {
  return { id, name: `Area ${id}` }
}

export function stopPoint(id: string, stopAreaId: string): StopPoint {
  return { id, name: `Point ${id}`, stopAreaId }
}

/**
 * SA1 <- SP1, SP2 and SA2 <- SP3
 */
export function stopFixture() {
  const stopAreas = new CollectionWithId([stopArea("SA1"), stopArea("SA2")], "stop_areas")
  const stopPoints = new CollectionWithId(
    [stopPoint("SP1", "SA1"), stopPoint("SP2", "SA1"), stopPoint("SP3", "SA2")],
    "stop_points",
  )
  return { stopAreas, stopPoints }
}
