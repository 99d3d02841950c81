#!/usr/bin/env -S node --import tsx
/**
 * Trakt Sync Plugin CLI
 */

import { Command } from 'commander';
import { PluginHost, createLogger, createStorage, describeError } from '@mediabridge/plugin-utils';
import { loadConfig, seedSettings } from './config.js';
import { TRAKT_PLUGIN_ID, type TraktSyncPlugin } from './plugin.js';
import { TraktClient } from './client.js';
import { createPlugin, createServer } from './server.js';

const logger = createLogger('trakt-sync:cli');

const program = new Command();

program
  .name('mediabridge-trakt')
  .description('Trakt watchlist sync plugin for mediabridge')
  .version('1.0.0');

async function withPlugin(fn: (plugin: TraktSyncPlugin) => Promise<void>): Promise<void> {
  const config = loadConfig();
  const storage = await createStorage();
  const host = new PluginHost({ registry: storage.registry, configStore: storage.configStore });
  const plugin = createPlugin(config);

  host.register(plugin);
  try {
    await host.start({ [TRAKT_PLUGIN_ID]: seedSettings(config) });
    if (!plugin.getState()) {
      throw new Error('Plugin is disabled; set TRAKT_ENABLED=true or enable it through the API');
    }
    await fn(plugin);
  } finally {
    await host.shutdown();
    await storage.close();
  }
}

program
  .command('server')
  .description('Start the API server')
  .option('-p, --port <port>', 'Server port', '3503')
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
  .description('Show plugin settings and token state')
  .action(async () => {
    try {
      await withPlugin(async (plugin) => {
        const settings = plugin.getSettings();
        console.log('\nTrakt Sync Status');
        console.log('=================');
        console.log(`Client ID:      ${settings.clientId ? 'set' : 'missing'}`);
        console.log(`Refresh token:  ${settings.refreshToken ? 'set' : 'missing'}`);
        console.log(`Token expires:  ${settings.tokenExpiresAt || 'unknown'}`);
        console.log(`Sync schedule:  ${settings.cron || 'daily'}`);
        console.log(`Auto download:  ${settings.autoDownload ? 'yes' : 'no'}`);
        console.log(`Custom lists:   ${settings.customLists || 'none'}`);
      });
    } catch (error) {
      logger.error('Status check failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('sync')
  .description('Sync the Trakt watchlist into host subscriptions')
  .option('-d, --download', 'Search and download instead of only subscribing')
  .action(async (options: { download?: boolean }) => {
    try {
      await withPlugin(async (plugin) => {
        const result = await plugin.sync(options.download ? true : undefined);
        if (!result.success) {
          throw new Error(result.errors.join('; '));
        }

        const { stats } = result;
        logger.success(`Sync complete in ${(result.duration / 1000).toFixed(1)}s`);
        console.log(`Movies: ${stats.moviesAdded} added, ${stats.moviesExisting} existing`);
        console.log(`Shows:  ${stats.showsAdded} added, ${stats.showsExisting} existing`);
        console.log(`Skipped: ${stats.skipped}, errors: ${stats.errors}`);
        result.errors.forEach(error => console.log(`  ! ${error}`));
      });
    } catch (error) {
      logger.error('Sync failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('auth <code>')
  .description('Exchange an authorization code for tokens and store them')
  .action(async (code: string) => {
    try {
      await withPlugin(async (plugin) => {
        const tokens = await plugin.authorize(code);
        logger.success(`Authorized; token valid until ${tokens.expiresAt?.toISOString() ?? 'unknown'}`);
      });
    } catch (error) {
      logger.error('Authorization failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program
  .command('token')
  .description('Check the stored access token against Trakt')
  .action(async () => {
    try {
      await withPlugin(async (plugin) => {
        const settings = plugin.getSettings();
        const client = new TraktClient({
          clientId: settings.clientId,
          clientSecret: settings.clientSecret,
          proxy: settings.proxy,
        });
        const user = await client.getUsername(settings.accessToken);
        if (!user.ok) {
          throw new Error(user.error.message);
        }
        console.log(`Token belongs to ${user.value}; expires ${settings.tokenExpiresAt || 'unknown'}`);
      });
    } catch (error) {
      logger.error('Token check failed', { error: describeError(error) });
      process.exit(1);
    }
  });

program.parse();
