/**
 * Trakt Sync Plugin Configuration
 */

import 'dotenv/config';
import {
  loadSecurityConfig,
  parseBoolean,
  validatePort,
  type SecurityConfig,
  type StoredSettings,
} from '@mediabridge/plugin-utils';

export interface Config {
  // Trakt (seed for the stored plugin settings)
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  enabled: boolean;
  syncCron?: string;
  autoDownload: boolean;
  notify: boolean;
  customLists: string;
  useProxy: boolean;

  // Media host
  mediaHostUrl: string;
  mediaHostApiKey: string;

  // Server
  port: number;
  host: string;

  // Security
  security: SecurityConfig;
}

export function loadConfig(overrides?: Partial<Config>): Config {
  const clientId = process.env.TRAKT_CLIENT_ID ?? '';
  const clientSecret = process.env.TRAKT_CLIENT_SECRET ?? '';

  const config: Config = {
    // Trakt
    clientId,
    clientSecret,
    refreshToken: process.env.TRAKT_REFRESH_TOKEN ?? '',
    enabled: parseBoolean(process.env.TRAKT_ENABLED, Boolean(clientId && clientSecret)),
    syncCron: process.env.TRAKT_SYNC_CRON,
    autoDownload: parseBoolean(process.env.TRAKT_AUTO_DOWNLOAD, false),
    notify: parseBoolean(process.env.TRAKT_NOTIFY, true),
    customLists: process.env.TRAKT_CUSTOM_LISTS ?? '',
    useProxy: parseBoolean(process.env.TRAKT_PROXY, false),

    // Media host
    mediaHostUrl: process.env.MEDIA_HOST_URL ?? 'http://127.0.0.1:3001',
    mediaHostApiKey: process.env.MEDIA_HOST_API_KEY ?? '',

    // Server
    port: validatePort(process.env.TRAKT_PLUGIN_PORT ?? process.env.PORT, 3503),
    host: process.env.TRAKT_PLUGIN_HOST ?? process.env.HOST ?? '0.0.0.0',

    // Security
    security: loadSecurityConfig('TRAKT_PLUGIN'),

    // Apply overrides
    ...overrides,
  };

  return config;
}

/** Settings stored for the plugin the first time the host starts */
export function seedSettings(config: Config): StoredSettings {
  return {
    enabled: config.enabled,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    refreshToken: config.refreshToken,
    autoDownload: config.autoDownload,
    notify: config.notify,
    customLists: config.customLists,
    proxy: config.useProxy,
    ...(config.syncCron !== undefined ? { cron: config.syncCron } : {}),
  };
}
