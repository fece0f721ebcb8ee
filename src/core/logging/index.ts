export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getRenderLogger,
  logger,
} from './logger.js';
export type { LineageLogger, LoggerConfig, LoggerContext, LogLevel } from './types.js';
export { LOG_LEVELS } from './types.js';
