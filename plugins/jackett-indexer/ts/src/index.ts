/**
 * Jackett Indexer Plugin for mediabridge
 * Jackett's Torznab indexers as searchable sites
 */

export { JackettClient } from './client.js';
export { JackettIndexerPlugin, JACKETT_PLUGIN_ID, JACKETT_DOMAIN_PREFIX } from './plugin.js';
export { parseCaps, parseIndexers, parseItems, mapTorznabItem, toPrivacy } from './torznab.js';
export { createServer } from './server.js';
export { loadConfig, seedSettings } from './config.js';
export * from './types.js';
