export * from './reader-schemas.js';
