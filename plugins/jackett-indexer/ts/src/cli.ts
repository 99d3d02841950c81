#!/usr/bin/env -S node --import tsx
/**
 * Jackett Indexer Plugin CLI
 * Command-line interface for the Jackett indexer plugin
 */

import { Command } from 'commander';
import { PluginHost, createLogger, createStorage, describeError, type MediaType } from '@mediabridge/plugin-utils';
import { loadConfig, seedSettings } from './config.js';
import { JackettIndexerPlugin, JACKETT_PLUGIN_ID } from './plugin.js';
import { createServer } from './server.js';

const logger = createLogger('jackett-indexer:cli');

const program = new Command();

program
  .name('mediabridge-jackett')
  .description('Jackett indexer plugin for mediabridge - search Jackett indexers as sites')
  .version('1.0.0');

/** Starts a host with the plugin, runs `fn` and shuts everything down again. */
async function withPlugin(fn: (plugin: JackettIndexerPlugin, host: PluginHost) => Promise<void>): Promise<void> {
  const config = loadConfig();
  const storage = await createStorage();
  const host = new PluginHost({ registry: storage.registry, configStore: storage.configStore });
  const plugin = new JackettIndexerPlugin();

  host.register(plugin);
  try {
    await host.start({ [JACKETT_PLUGIN_ID]: seedSettings(config) });
    if (!plugin.getState()) {
      throw new Error('Plugin is disabled; set JACKETT_ENABLED=true or enable it through the API');
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

// Server command
program
  .command('server')
  .description('Start the API server')
  .option('-p, --port <port>', 'Server port', '3501')
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

// Status command
program
  .command('status')
  .description('Show plugin status and registered sites')
  .action(async () => {
    try {
      await withPlugin(async (plugin, host) => {
        const settings = plugin.getSettings();
        const lastUpdate = plugin.getLastUpdate();
        const sites = await host.listSites();

        console.log('\nJackett Plugin Status');
        console.log('=====================');
        console.log(`Jackett:        ${settings.host}`);
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

// Sync command
program
  .command('sync')
  .description('Sync the Jackett indexer list into the site registry')
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

// Indexers command
program
  .command('indexers')
  .description('List the indexers configured in Jackett')
  .action(async () => {
    try {
      await withPlugin(async (plugin) => {
        const indexers = plugin.getIndexers();
        console.log('\nIndexers:');
        console.log('-'.repeat(80));
        indexers.forEach(site => {
          console.log(`${site.indexerId} | ${site.indexerName} | ${site.privacy} | ${site.domain}`);
        });
        console.log(`\nTotal: ${indexers.length}`);
      });
    } catch (error) {
      logger.error('Command failed', { error: describeError(error) });
      process.exit(1);
    }
  });

// Search command
program
  .command('search <keyword>')
  .description('Search all Jackett indexers')
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

// Caps command
program
  .command('caps <indexer>')
  .description('Show the Torznab capabilities of an indexer')
  .action(async (indexer: string) => {
    try {
      await withPlugin(async (plugin) => {
        const caps = await plugin.getCaps(indexer);
        if (!caps.ok) {
          throw new Error(caps.error.message);
        }

        console.log(`\n${caps.value.serverTitle || 'Jackett'} capabilities for ${indexer}`);
        console.log(`Limits: max ${caps.value.limits.max}, default ${caps.value.limits.default}`);
        console.log('\nSearch modes:');
        caps.value.searchModes.forEach(mode => {
          console.log(`  ${mode.mode}: ${mode.available ? 'yes' : 'no'} (${mode.supportedParams.join(', ')})`);
        });
        console.log('\nCategories:');
        caps.value.categories.forEach(category => {
          console.log(`  ${category.id} ${category.name}`);
          category.subcategories.forEach(sub => console.log(`    ${sub.id} ${sub.name}`));
        });
      });
    } catch (error) {
      logger.error('Caps lookup failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program.parse();
