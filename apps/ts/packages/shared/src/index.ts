export * from './config/index.js';
export * from './errors/index.js';
export * from './job-list/index.js';
export * from './outcome/index.js';
export * from './types/flexreport.js';
export * from './utils/backoff.js';
export * from './utils/filename.js';
export type { ILogger, LogContext, LogLevel } from './utils/logger-interface.js';
export { isValidLogLevel, type Logger, logger } from './utils/logger.js';
