/**
 * Picks the site registry and settings store backing a plugin host:
 * Postgres when the environment names a server, memory otherwise.
 */

import { createDatabase, isDatabaseConfigured, type Database } from './database.js';
import { MemorySiteRegistry, PostgresSiteRegistry, type SiteRegistry } from './site-registry.js';
import { MemoryConfigStore, PostgresConfigStore, type ConfigStore } from './config-store.js';
import { createLogger } from './logger.js';
import { describeError } from './result.js';

const logger = createLogger('storage');

export interface PluginStorage {
  registry: SiteRegistry;
  configStore: ConfigStore;
  /** Checks the backing store can serve requests */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function createMemoryStorage(): PluginStorage {
  return {
    registry: new MemorySiteRegistry(),
    configStore: new MemoryConfigStore(),
    ping: async () => true,
    close: async () => undefined,
  };
}

export async function createPostgresStorage(db: Database): Promise<PluginStorage> {
  await db.connect();

  const registry = new PostgresSiteRegistry(db);
  const configStore = new PostgresConfigStore(db);
  await registry.initializeSchema();
  await configStore.initializeSchema();

  return {
    registry,
    configStore,
    ping: async () => {
      try {
        await db.execute('SELECT 1');
        return true;
      } catch (error) {
        logger.error('Database ping failed', { error: describeError(error) });
        return false;
      }
    },
    close: () => db.disconnect(),
  };
}

export async function createStorage(env: NodeJS.ProcessEnv = process.env): Promise<PluginStorage> {
  if (isDatabaseConfigured(env)) {
    logger.info('Using Postgres storage');
    return createPostgresStorage(createDatabase(env));
  }

  logger.info('No database configured, using in-memory storage');
  return createMemoryStorage();
}
