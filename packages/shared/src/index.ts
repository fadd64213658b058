export { logger, createLogger, traceFields } from './logger.js';
export { withSpan } from './tracing.js';
