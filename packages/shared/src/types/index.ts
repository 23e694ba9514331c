/**
 * Shared types for equity-pilot
 */

export * from './market.js';
export * from './trade.js';
export * from './execution.js';
export * from './notification.js';
