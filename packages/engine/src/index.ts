/**
 * @solstice/engine
 *
 * Module action-scheduling engine: event listeners, requirement checks,
 * action execution, persisted side effects and the scheduler loop.
 */

export * from './errors.js';
export { createLogger, parseLogLevel, LOG_LEVELS } from './logger.js';
export type { LoggerOptions } from './logger.js';

export * from './context/index.js';
export * from './event-listener/index.js';
export * from './requirements/index.js';
export * from './shell/index.js';
export * from './render/index.js';
export * from './persistence/index.js';
export * from './actions/index.js';
export * from './module/index.js';
export * from './config/index.js';
export * from './daemon/index.js';
