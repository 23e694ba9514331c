/**
 * @equity-pilot/shared - Types, schemas, configuration and logging
 *
 * Shared by the trader package and its scripts.
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './errors.js';
export * from './logger.js';
export * from './telegram-alerts.js';
export * from './config/load-config.js';
export * from './utils/load-env.js';
