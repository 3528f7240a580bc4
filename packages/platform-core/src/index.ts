/**
 * Platform Core - Shared utilities for folio services
 *
 * - Structured logging with correlation tracking
 * - Error handling patterns
 * - Response helpers and request validation for Express
 * - Configuration management utilities
 */

export * from './config/index.js';
export * from './http/index.js';
export * from './logging/index.js';
export * from './middleware/index.js';
export * from './errors/domain-error.js';
