/**
 * Trakt Sync Plugin Server
 * HTTP API for the plugin host running the Trakt sync plugin
 */

import { PluginHost, createLogger, describeError, createPluginServer, createStorage, type PluginStorage } from '@mediabridge/plugin-utils';
import { TraktSyncPlugin, TRAKT_PLUGIN_ID, type TraktPluginOptions } from './plugin.js';
import { MediaHostClient } from './host-client.js';
import { loadConfig, seedSettings, type Config } from './config.js';

const logger = createLogger('trakt-sync:server');

export interface ServerDependencies {
  storage?: PluginStorage;
  /** Plugin options; `collaborators` replaces the media host client built from the config */
  plugin?: Partial<TraktPluginOptions>;
  onlyOnceDelayMs?: number;
}

export function createPlugin(config: Config, options: Partial<TraktPluginOptions> = {}): TraktSyncPlugin {
  const collaborators = options.collaborators ?? new MediaHostClient({
    baseUrl: config.mediaHostUrl,
    apiKey: config.mediaHostApiKey,
  }).collaborators();
  return new TraktSyncPlugin({ ...options, collaborators });
}

export async function createServer(config?: Partial<Config>, deps: ServerDependencies = {}) {
  const fullConfig = loadConfig(config);

  const storage = deps.storage ?? await createStorage();
  const plugin = createPlugin(fullConfig, deps.plugin);
  const pluginHost = new PluginHost({
    registry: storage.registry,
    configStore: storage.configStore,
    onlyOnceDelayMs: deps.onlyOnceDelayMs,
  });

  pluginHost.register(plugin);
  await pluginHost.start({ [TRAKT_PLUGIN_ID]: seedSettings(fullConfig) });

  const server = await createPluginServer(pluginHost, {
    name: TRAKT_PLUGIN_ID,
    version: plugin.version,
    port: fullConfig.port,
    host: fullConfig.host,
    security: fullConfig.security,
    storage,
  });

  return { ...server, plugin };
}

// Start server if run directly
const isMainModule = import.meta.url === `file://${process.argv[1]}`;
if (isMainModule) {
  createServer()
    .then(server => server.start())
    .catch(error => {
      logger.error('Failed to start server', { error: describeError(error) });
      process.exit(1);
    });
}
