/**
 * @sessionkit/observability
 *
 * Structured logging for the session packages.
 */

export { createLogger, logger, redactTokens } from './logger.js';
export type { Logger } from './logger.js';
