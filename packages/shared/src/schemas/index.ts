/**
 * Zod schemas for runtime validation
 */

export * from './bar.schema.js';
export * from './order.schema.js';
export * from './config.schema.js';
