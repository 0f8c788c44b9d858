/**
 * @payflow/observability
 *
 * Structured logging for the payflow services.
 */

export { createLogger, logger, redactString, redactValue, type Logger } from './logger.js';
