export { loadConfig, loadConfigOrDefault, defaultConfig, envSchema, LOG_LEVELS } from './config'
export type { TransitModelConfig, LogLevel } from './config'
