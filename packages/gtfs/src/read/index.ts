export { readAgencies, agencyRowSchema } from "./agency"
export type { AgencyRow } from "./agency"
export { readStops, stopRowSchema, STOP_CODE_KEY } from "./stops"
export type { StopRow } from "./stops"
export { readRoutes, routeRowSchema, tripRowSchema } from "./routes"
export type { RouteRow, TripRow, RouteCollections } from "./routes"
export { normalizeRouteType, commercialModeOf, physicalModeOf, BUS_ROUTE_TYPE } from "./modes"
export { parseRows } from "./rows"
export type { Row } from "./rows"
export { readConfig, datasetConfigSchema, DEFAULT_CONTRIBUTOR, DEFAULT_DATASET_ID, VALIDITY_MARGIN_DAYS } from "./config"
export type { DatasetConfig } from "./config"
