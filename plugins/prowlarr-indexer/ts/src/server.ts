/**
 * Prowlarr Indexer Plugin Server
 * HTTP API for the plugin host running the Prowlarr plugin
 */

import { PluginHost, createLogger, describeError, createPluginServer, createStorage, type PluginStorage } from '@mediabridge/plugin-utils';
import { ProwlarrIndexerPlugin, PROWLARR_PLUGIN_ID, type ProwlarrPluginOptions } from './plugin.js';
import { loadConfig, seedSettings, type Config } from './config.js';

const logger = createLogger('prowlarr-indexer:server');

export interface ServerDependencies {
  storage?: PluginStorage;
  plugin?: ProwlarrPluginOptions;
  onlyOnceDelayMs?: number;
}

export async function createServer(config?: Partial<Config>, deps: ServerDependencies = {}) {
  const fullConfig = loadConfig(config);

  const storage = deps.storage ?? await createStorage();
  const plugin = new ProwlarrIndexerPlugin(deps.plugin);
  const pluginHost = new PluginHost({
    registry: storage.registry,
    configStore: storage.configStore,
    onlyOnceDelayMs: deps.onlyOnceDelayMs,
  });

  pluginHost.register(plugin);
  await pluginHost.start({ [PROWLARR_PLUGIN_ID]: seedSettings(fullConfig) });

  const server = await createPluginServer(pluginHost, {
    name: PROWLARR_PLUGIN_ID,
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
