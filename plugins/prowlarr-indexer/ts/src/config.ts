/**
 * Prowlarr Indexer Plugin Configuration
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
  // Prowlarr (seed for the stored plugin settings)
  prowlarrUrl: string;
  prowlarrApiKey: string;
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
  const prowlarrUrl = process.env.PROWLARR_URL ?? '';
  const prowlarrApiKey = process.env.PROWLARR_API_KEY ?? '';

  const config: Config = {
    // Prowlarr
    prowlarrUrl,
    prowlarrApiKey,
    enabled: parseBoolean(process.env.PROWLARR_ENABLED, Boolean(prowlarrUrl && prowlarrApiKey)),
    syncCron: process.env.PROWLARR_SYNC_CRON,
    useProxy: parseBoolean(process.env.PROWLARR_PROXY, false),

    // Server
    port: validatePort(process.env.PROWLARR_PLUGIN_PORT ?? process.env.PORT, 3502),
    host: process.env.PROWLARR_PLUGIN_HOST ?? process.env.HOST ?? '0.0.0.0',

    // Security
    security: loadSecurityConfig('PROWLARR_PLUGIN'),

    // Apply overrides
    ...overrides,
  };

  return config;
}

/** Settings stored for the plugin the first time the host starts */
export function seedSettings(config: Config): StoredSettings {
  return {
    enabled: config.enabled,
    host: config.prowlarrUrl,
    apiKey: config.prowlarrApiKey,
    proxy: config.useProxy,
    ...(config.syncCron !== undefined ? { cron: config.syncCron } : {}),
  };
}
