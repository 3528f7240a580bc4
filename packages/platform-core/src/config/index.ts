/**
 * Configuration Module - Index
 */

export * from './environment-config.js';
export * from './config-builder.js';
