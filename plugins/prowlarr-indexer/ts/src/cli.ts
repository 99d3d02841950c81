#!/usr/bin/env -S node --import tsx
/**
 * Prowlarr Indexer Plugin CLI
 */

import { Command } from 'commander';
import { PluginHost, createLogger, createStorage, describeError, type MediaType } from '@mediabridge/plugin-utils';
import { loadConfig, seedSettings } from './config.js';
import { ProwlarrIndexerPlugin, PROWLARR_PLUGIN_ID } from './plugin.js';
import { createServer } from './server.js';

const logger = createLogger('prowlarr-indexer:cli');

const program = new Command();

program
  .name('mediabridge-prowlarr')
  .description('Prowlarr indexer plugin for mediabridge - search Prowlarr indexers as sites')
  .version('1.0.0');

async function withPlugin(fn: (plugin: ProwlarrIndexerPlugin, host: PluginHost) => Promise<void>): Promise<void> {
  const config = loadConfig();
  const storage = await createStorage();
  const host = new PluginHost({ registry: storage.registry, configStore: storage.configStore });
  const plugin = new ProwlarrIndexerPlugin();

  host.register(plugin);
  try {
    await host.start({ [PROWLARR_PLUGIN_ID]: seedSettings(config) });
    if (!plugin.getState()) {
      throw new Error('Plugin is disabled; set PROWLARR_ENABLED=true or enable it through the API');
    }
    await fn(plugin, host);
  } finally {
    await host.shutdown();
    await storage.close();
  }
}

function toMediaType(value: string | undefined): MediaType | undefined {
  if (value === undefined) return undefined;
  if (value === 'movie' || value === 'tv') return value;
  throw new Error(`Unknown media type ${value}; use movie or tv`);
}

program
  .command('server')
  .description('Start the API server')
  .option('-p, --port <port>', 'Server port', '3502')
  .option('-h, --host <host>', 'Server host', '0.0.0.0')
  .action(async (options: { port: string; host: string }) => {
    try {
      const server = await createServer({
        port: parseInt(options.port, 10),
        host: options.host,
      });
      await server.start();
    } catch (error) {
      logger.error('Server failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('status')
  .description('Show Prowlarr and plugin status')
  .action(async () => {
    try {
      await withPlugin(async (plugin, host) => {
        const settings = plugin.getSettings();
        const lastUpdate = plugin.getLastUpdate();
        const system = await plugin.getSystemStatus();
        const sites = await host.listSites();

        console.log('\nProwlarr Plugin Status');
        console.log('======================');
        console.log(`Prowlarr:       ${settings.host}`);
        console.log(`Version:        ${system.ok ? system.value.version : `unreachable (${system.error.message})`}`);
        console.log(`Sync schedule:  ${settings.cron || 'disabled'}`);
        console.log(`Last sync:      ${lastUpdate ? lastUpdate.toISOString() : 'never'}`);
        console.log(`Indexers:       ${plugin.getIndexers().length}`);
        console.log(`Sites:          ${sites.filter(site => site.domain.startsWith(`${plugin.domainPrefix}.`)).length}`);
      });
    } catch (error) {
      logger.error('Status check failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('sync')
  .description('Sync the Prowlarr indexer list into the site registry')
  .action(async () => {
    try {
      await withPlugin(async (plugin) => {
        const result = await plugin.syncIndexers();
        if (!result.ok) {
          throw new Error(result.error.message);
        }
        logger.success(`Synced ${result.value.total} indexers, ${result.value.added} new`);
      });
    } catch (error) {
      logger.error('Sync failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('indexers')
  .description('List the indexers enabled in Prowlarr')
  .action(async () => {
    try {
      await withPlugin(async (plugin) => {
        const indexers = plugin.getIndexers();
        console.log('\nIndexers:');
        console.log('-'.repeat(80));
        indexers.forEach(site => {
          console.log(`${site.indexerId.padStart(4)} | ${site.indexerName} | ${site.privacy} | ${site.domain}`);
        });
        console.log(`\nTotal: ${indexers.length}`);
      });
    } catch (error) {
      logger.error('Command failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('search <keyword>')
  .description('Search all Prowlarr indexers')
  .option('-t, --type <type>', 'Media type (movie, tv)')
  .option('-i, --indexer <indexer>', 'Only search this indexer (id or name)')
  .option('-p, --page <page>', 'Result page', '0')
  .option('-l, --limit <limit>', 'Number of results to show', '20')
  .action(async (keyword: string, options: { type?: string; indexer?: string; page: string; limit: string }) => {
    try {
      const mtype = toMediaType(options.type);
      await withPlugin(async (plugin) => {
        const results = await plugin.searchAll(keyword, {
          mtype,
          indexer: options.indexer,
          page: parseInt(options.page, 10) || 0,
        });

        console.log(`\nResults for "${keyword}":`);
        console.log('-'.repeat(100));
        results
          .sort((a, b) => b.seeders - a.seeders)
          .slice(0, parseInt(options.limit, 10) || 20)
          .forEach(torrent => {
            console.log(`${torrent.title} | ${torrent.siteName} | S:${torrent.seeders} L:${torrent.peers} | ${torrent.pubDate}`);
          });
        console.log(`\nTotal: ${results.length}`);
      });
    } catch (error) {
      logger.error('Search failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program.parse();
