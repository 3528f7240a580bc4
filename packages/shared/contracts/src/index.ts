/**
 * Shared contracts for the folio platform
 *
 * Wire contracts shared by the reader service and its clients
 */

export * from './common/index.js';

export * from './api/index.js';

export * from './archive/index.js';
