/**
 * Jackett Indexer Plugin Server
 * HTTP API for the plugin host running the Jackett plugin
 */

import { PluginHost, createLogger, describeError, createPluginServer, createStorage, type PluginStorage } from '@mediabridge/plugin-utils';
import { JackettIndexerPlugin, JACKETT_PLUGIN_ID, type JackettPluginOptions } from './plugin.js';
import { loadConfig, seedSettings, type Config } from './config.js';

const logger = createLogger('jackett-indexer:server');

export interface ServerDependencies {
  storage?: PluginStorage;
  plugin?: JackettPluginOptions;
  onlyOnceDelayMs?: number;
}

export async function createServer(config?: Partial<Config>, deps: ServerDependencies = {}) {
  const fullConfig = loadConfig(config);

  const storage = deps.storage ?? await createStorage();
  const plugin = new JackettIndexerPlugin(deps.plugin);
  const pluginHost = new PluginHost({
    registry: storage.registry,
    configStore: storage.configStore,
    onlyOnceDelayMs: deps.onlyOnceDelayMs,
  });

  pluginHost.register(plugin);
  await pluginHost.start({ [JACKETT_PLUGIN_ID]: seedSettings(fullConfig) });

  const server = await createPluginServer(pluginHost, {
    name: JACKETT_PLUGIN_ID,
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
