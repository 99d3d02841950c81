/**
 * Per-plugin settings storage
 */

import type { Database } from './database.js';

export type StoredSettings = Record<string, unknown>;

export interface ConfigStore {
  get(pluginId: string): Promise<StoredSettings | null>;
  save(pluginId: string, settings: StoredSettings): Promise<void>;
}

export class MemoryConfigStore implements ConfigStore {
  private configs = new Map<string, StoredSettings>();

  constructor(initial?: Record<string, StoredSettings>) {
    for (const [pluginId, settings] of Object.entries(initial ?? {})) {
      this.configs.set(pluginId, { ...settings });
    }
  }

  async get(pluginId: string): Promise<StoredSettings | null> {
    const settings = this.configs.get(pluginId);
    return settings ? { ...settings } : null;
  }

  async save(pluginId: string, settings: StoredSettings): Promise<void> {
    this.configs.set(pluginId, { ...settings });
  }
}

export class PostgresConfigStore implements ConfigStore {
  constructor(private readonly db: Database) {}

  async initializeSchema(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS plugin_configs (
        plugin_id TEXT PRIMARY KEY,
        settings JSONB NOT NULL DEFAULT '{}',
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  async get(pluginId: string): Promise<StoredSettings | null> {
    const row = await this.db.queryOne<{ settings: StoredSettings | null }>(
      'SELECT settings FROM plugin_configs WHERE plugin_id = $1',
      [pluginId]
    );
    return row?.settings ?? null;
  }

  async save(pluginId: string, settings: StoredSettings): Promise<void> {
    await this.db.execute(
      `INSERT INTO plugin_configs (plugin_id, settings)
       VALUES ($1, $2)
       ON CONFLICT (plugin_id) DO UPDATE SET settings = EXCLUDED.settings, updated_at = NOW()`,
      [pluginId, JSON.stringify(settings)]
    );
  }
}
