/**
 * Transit Objects
 *
 * Domain objects held in the model's collections. Objects never point at each
 * other: references are ids, resolved into relations when the model is built.
 */

/** Key/value code, e.g. ["gtfs_stop_code", "1234"] */
export type Code = readonly [key: string, value: string]

export interface Coord {
  lon: number
  lat: number
}

export interface Network {
  id: string
  name: string
  url?: string
  timezone?: string
  lang?: string
  phone?: string
}

export interface Company {
  id: string
  name: string
  url?: string
  mail?: string
  phone?: string
}

export interface StopArea {
  id: string
  name: string
  codes: Code[]
  coord: Coord
  timezone?: string
  visible: boolean
}

export interface StopPoint {
  id: string
  name: string
  codes: Code[]
  coord: Coord
  stopAreaId: string
  timezone?: string
  visible: boolean
}

export interface CommercialMode {
  id: string
  name: string
}

export interface PhysicalMode {
  id: string
  name: string
}

export interface Line {
  id: string
  code?: string
  name: string
  color?: string
  textColor?: string
  sortOrder?: number
  networkId: string
  commercialModeId: string
}

export type DirectionType = "forward" | "backward"

export interface Route {
  id: string
  name: string
  directionType: DirectionType
  lineId: string
}

export interface Contributor {
  id: string
  name: string
  license?: string
  website?: string
}

/** Calendar dates are ISO `YYYY-MM-DD` strings */
export interface Dataset {
  id: string
  contributorId: string
  startDate: string
  endDate: string
}
