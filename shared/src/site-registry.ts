/**
 * Site registry
 *
 * The host's persistent list of sites, keyed by domain. Plugins add the
 * indexers they discover and never remove them; removal is left to the user.
 */

import { z } from 'zod';
import type { Database } from './database.js';
import type { SiteRecord } from './types.js';
import { createLogger } from './logger.js';

const logger = createLogger('site-registry');

export const siteRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  domain: z.string(),
  url: z.string(),
  public: z.boolean(),
  proxy: z.boolean(),
  category: z.string().optional(),
  indexerId: z.string().default(''),
  indexerName: z.string().default(''),
  privacy: z.enum(['public', 'semi-private', 'private']).default('private'),
});

export interface SiteRegistry {
  get(domain: string): Promise<SiteRecord | null>;
  add(domain: string, site: SiteRecord): Promise<void>;
  delete(domain: string): Promise<boolean>;
  list(): Promise<SiteRecord[]>;
}

export class MemorySiteRegistry implements SiteRegistry {
  private sites = new Map<string, SiteRecord>();

  async get(domain: string): Promise<SiteRecord | null> {
    const site = this.sites.get(domain);
    return site ? { ...site } : null;
  }

  async add(domain: string, site: SiteRecord): Promise<void> {
    this.sites.set(domain, { ...site, domain });
  }

  async delete(domain: string): Promise<boolean> {
    return this.sites.delete(domain);
  }

  async list(): Promise<SiteRecord[]> {
    return Array.from(this.sites.values(), site => ({ ...site }));
  }
}

export class PostgresSiteRegistry implements SiteRegistry {
  constructor(private readonly db: Database) {}

  async initializeSchema(): Promise<void> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS plugin_sites (
        domain TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        data JSONB NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  private toRecord(domain: string, data: unknown): SiteRecord | null {
    const parsed = siteRecordSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Ignoring malformed site row', { domain, error: parsed.error.message });
      return null;
    }
    return parsed.data;
  }

  async get(domain: string): Promise<SiteRecord | null> {
    const row = await this.db.queryOne<{ domain: string; data: unknown }>(
      'SELECT domain, data FROM plugin_sites WHERE domain = $1',
      [domain]
    );
    return row ? this.toRecord(row.domain, row.data) : null;
  }

  async add(domain: string, site: SiteRecord): Promise<void> {
    await this.db.execute(
      `INSERT INTO plugin_sites (domain, name, data)
       VALUES ($1, $2, $3)
       ON CONFLICT (domain) DO UPDATE SET name = EXCLUDED.name, data = EXCLUDED.data, updated_at = NOW()`,
      [domain, site.name, JSON.stringify({ ...site, domain })]
    );
  }

  async delete(domain: string): Promise<boolean> {
    const deleted = await this.db.execute('DELETE FROM plugin_sites WHERE domain = $1', [domain]);
    return deleted > 0;
  }

  async list(): Promise<SiteRecord[]> {
    const result = await this.db.query<{ domain: string; data: unknown }>(
      'SELECT domain, data FROM plugin_sites ORDER BY name'
    );
    const sites: SiteRecord[] = [];
    for (const row of result.rows) {
      const site = this.toRecord(row.domain, row.data);
      if (site) sites.push(site);
    }
    return sites;
  }
}
