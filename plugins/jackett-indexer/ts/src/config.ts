/**
 * Jackett Indexer Plugin Configuration
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
  // Jackett (seed for the stored plugin settings)
  jackettUrl: string;
  jackettApiKey: string;
  enabled: boolean;
  syncCron?: string;
  useProxy: boolean;

  // Server
  port: number;
  host: string;

  // Security
  security: SecurityConfig;
}

export function loadConfig(overrides?: Partial<Config>): Config {
  const jackettUrl = process.env.JACKETT_URL ?? '';
  const jackettApiKey = process.env.JACKETT_API_KEY ?? '';

  const config: Config = {
    // Jackett
    jackettUrl,
    jackettApiKey,
    enabled: parseBoolean(process.env.JACKETT_ENABLED, Boolean(jackettUrl && jackettApiKey)),
    syncCron: process.env.JACKETT_SYNC_CRON,
    useProxy: parseBoolean(process.env.JACKETT_PROXY, false),

    // Server
    port: validatePort(process.env.JACKETT_PLUGIN_PORT ?? process.env.PORT, 3501),
    host: process.env.JACKETT_PLUGIN_HOST ?? process.env.HOST ?? '0.0.0.0',

    // Security
    security: loadSecurityConfig('JACKETT_PLUGIN'),

    // Apply overrides
    ...overrides,
  };

  return config;
}

/** Settings stored for the plugin the first time the host starts */
export function seedSettings(config: Config): StoredSettings {
  return {
    enabled: config.enabled,
    host: config.jackettUrl,
    apiKey: config.jackettApiKey,
    proxy: config.useProxy,
    ...(config.syncCron !== undefined ? { cron: config.syncCron } : {}),
  };
}
