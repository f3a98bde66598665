export { createLogger, isDebugEnabled, setDebugEnabled } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
