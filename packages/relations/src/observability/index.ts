export { Logger, logger } from './logger'
export type { LogEntry } from './logger'
