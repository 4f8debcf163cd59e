export { createLogger, logger, type Logger, type LoggerOptions } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
