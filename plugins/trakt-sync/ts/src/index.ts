/**
 * Trakt Sync Plugin for mediabridge
 */

export { TraktClient, toWatchlistEntries, TRAKT_API_URL, OOB_REDIRECT_URI } from './client.js';
export { TokenManager, DEFAULT_REFRESH_THRESHOLD_DAYS, DEFAULT_EXPIRES_IN_SECONDS } from './oauth.js';
export { TraktSyncService, buildNotification, parseCustomLists, emptyStats } from './sync.js';
export { MediaHostClient } from './host-client.js';
export { TraktSyncPlugin, traktSettingsSchema, TRAKT_PLUGIN_ID, TRAKT_COMMANDS } from './plugin.js';
export type { TraktSettings, TraktPluginOptions } from './plugin.js';
export type { MediaDownloader, MediaLibrary, MediaRecognizer, Notifier, SubscriptionService, SyncCollaborators } from './collaborators.js';
export { createServer, createPlugin } from './server.js';
export { loadConfig, seedSettings } from './config.js';
export * from './types.js';
