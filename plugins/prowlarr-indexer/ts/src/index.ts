/**
 * Prowlarr Indexer Plugin for mediabridge
 * Prowlarr's indexers as searchable sites
 */

export { ProwlarrClient } from './client.js';
export { ProwlarrIndexerPlugin, PROWLARR_PLUGIN_ID, PROWLARR_DOMAIN_PREFIX } from './plugin.js';
export { mapRelease, parseIndexers, parseReleases, toPrivacy } from './releases.js';
export { createServer } from './server.js';
export { loadConfig, seedSettings } from './config.js';
export * from './schemas.js';
