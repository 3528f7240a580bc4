/**
 * Logging Module - Index
 */

export * from './context.js';
export * from './logger.js';
export * from './formatting.js';
export * from './middleware.js';
export * from './error-serializer.js';
