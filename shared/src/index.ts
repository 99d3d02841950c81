/**
 * mediabridge Plugin Utilities
 * Shared building blocks for mediabridge plugins
 */

export * from './types.js';
export * from './result.js';
export * from './logger.js';
export * from './retry.js';
export * from './http.js';
export * from './database.js';
export * from './validation.js';
export * from './security.js';
export * from './torrent-fields.js';
export * from './indexer-address.js';
export * from './site-registry.js';
export * from './config-store.js';
export * from './storage.js';
export * from './scheduler.js';
export * from './ui.js';
export * from './plugin.js';
export * from './indexer-plugin.js';
export * from './host.js';
export * from './server.js';
