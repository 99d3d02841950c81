/**
 * Indexer plugin base
 *
 * Shared lifecycle of plugins that mirror an indexer aggregator's indexers
 * into the host's site registry and answer searches for those sites.
 */

import { z } from 'zod';
import { BasePlugin, baseSettingsSchema, type AgentTool, type PluginApiRoute, type PluginContext, type PluginService, type SearchProvider } from './plugin.js';
import { resolveIndexerId, siteOwner, siteTitle } from './indexer-address.js';
import { isEnglishKeyword } from './torrent-fields.js';
import { err, ok, pluginError, type Result } from './result.js';
import { alert, col, form, formatDateTime, row, switchField, table, textField, type UiNode } from './ui.js';
import type { IndexerPrivacy, MediaType, SearchRequest, SiteRecord, TorrentRecord } from './types.js';
import { MEDIA_TYPES } from './types.js';

/** Every six hours, on the hour */
export const DEFAULT_INDEXER_SYNC_CRON = '0 */6 * * *';

export const indexerSettingsSchema = baseSettingsSchema.extend({
  cron: z.string().default(DEFAULT_INDEXER_SYNC_CRON),
  host: z.string().trim().default('').transform(host => host.replace(/\/+$/, '')),
  apiKey: z.string().trim().default(''),
  proxy: z.boolean().default(false),
});

export type IndexerSettings = z.infer<typeof indexerSettingsSchema>;

/** An indexer as the upstream aggregator lists it */
export interface UpstreamIndexer {
  id: string;
  title: string;
  privacy: IndexerPrivacy;
  language?: string;
}

export interface IndexerClient {
  listIndexers(): Promise<Result<UpstreamIndexer[]>>;
  search(indexerId: string, request: SearchRequest, siteName: string): Promise<Result<TorrentRecord[]>>;
}

export interface IndexerState {
  settings: IndexerSettings;
  indexers: SiteRecord[];
  lastUpdate: Date | null;
}

export interface SyncSummary {
  total: number;
  added: number;
}

export interface SearchAllOptions {
  indexer?: string;
  mtype?: MediaType;
  page?: number;
}

const MAX_TOOL_RESULTS = 5;

const searchToolInput = z.object({
  keyword: z.string().trim().min(1),
  mtype: z.enum(['movie', 'tv']).optional(),
  indexer: z.string().trim().min(1).optional(),
});

function toMediaType(value: string | undefined): MediaType | undefined {
  return MEDIA_TYPES.find(type => type === value);
}

function toPage(value: string | undefined): number {
  const page = value ? parseInt(value, 10) : 0;
  return Number.isNaN(page) || page < 0 ? 0 : page;
}

function bytesToGb(bytes: number): string {
  return (bytes > 0 ? bytes / 1024 ** 3 : 0).toFixed(2);
}

function privacyIcon(privacy: IndexerPrivacy): string {
  if (privacy === 'public') return '🌐';
  if (privacy === 'semi-private') return '🔓';
  return '🔒';
}

export abstract class IndexerPlugin<TClient extends IndexerClient>
  extends BasePlugin<IndexerSettings>
  implements SearchProvider {
  readonly settingsSchema = indexerSettingsSchema;

  /** Domain prefix of registered sites, e.g. `jackett_indexer` */
  abstract readonly domainPrefix: string;
  /** Prefix of agent tool names */
  protected abstract readonly toolPrefix: string;
  /** Human readable name of the upstream service */
  protected abstract readonly upstreamName: string;
  /** Skip keywords that are not mostly English */
  protected abstract readonly englishOnly: boolean;

  protected state: IndexerState = {
    settings: indexerSettingsSchema.parse({}),
    indexers: [],
    lastUpdate: null,
  };
  protected client: TClient | null = null;
  private ctx: PluginContext | null = null;

  protected abstract createClient(settings: IndexerSettings): TClient;
  protected abstract buildSite(indexer: UpstreamIndexer, settings: IndexerSettings): SiteRecord;

  async init(settings: IndexerSettings, ctx: PluginContext): Promise<void> {
    await this.stop();

    this.ctx = ctx;
    this.state = { ...this.state, settings };
    this.client = null;

    if (!settings.enabled) {
      this.logger.info('Plugin disabled');
      return;
    }

    if (!settings.host || !settings.apiKey) {
      this.logger.error(`${this.upstreamName} host or API key missing`);
      return;
    }

    if (!/^https?:\/\//.test(settings.host)) {
      this.logger.error(`${this.upstreamName} host must start with http:// or https://`, { host: settings.host });
      return;
    }

    this.client = this.createClient(settings);

    const result = await this.syncIndexers();
    if (result.ok) {
      this.logger.info('Plugin initialized', { indexers: result.value.total, added: result.value.added });
    }
  }

  getState(): boolean {
    return this.state.settings.enabled;
  }

  getSettings(): IndexerSettings {
    return this.state.settings;
  }

  getIndexers(): SiteRecord[] {
    return this.state.indexers.map(site => ({ ...site }));
  }

  getLastUpdate(): Date | null {
    return this.state.lastUpdate;
  }

  /**
   * Fetches the upstream indexer list, rebuilds the site list from it and
   * registers every site the registry does not know yet. Existing sites are
   * left alone and none are removed.
   */
  async syncIndexers(): Promise<Result<SyncSummary>> {
    if (!this.client || !this.ctx) {
      return err(pluginError('upstream_unavailable', `${this.upstreamName} is not configured`));
    }

    const listed = await this.client.listIndexers();
    if (!listed.ok) {
      this.logger.error('Failed to fetch indexers', { kind: listed.error.kind, error: listed.error.message });
      return listed;
    }

    if (listed.value.length === 0) {
      this.logger.warn(`${this.upstreamName} returned no indexers`);
    }

    const settings = this.state.settings;
    const sites = listed.value.map(indexer => this.buildSite(indexer, settings));

    let added = 0;
    for (const site of sites) {
      if (await this.ctx.registry.get(site.domain)) {
        this.logger.debug('Site already registered', { name: site.name, domain: site.domain });
        continue;
      }
      await this.ctx.registry.add(site.domain, site);
      this.logger.info('Site registered', { name: site.name, domain: site.domain });
      added++;
    }

    this.state = { ...this.state, indexers: sites, lastUpdate: new Date() };
    this.logger.info('Indexer sync complete', { total: sites.length, added });

    return ok({ total: sites.length, added });
  }

  async runNow(): Promise<void> {
    await this.syncIndexers();
  }

  async searchDetailed(site: SiteRecord, request: SearchRequest): Promise<Result<TorrentRecord[]>> {
    const keyword = request.keyword.trim();
    if (!keyword) {
      this.logger.debug('Empty keyword, nothing to search');
      return ok([]);
    }

    if (this.englishOnly && !isEnglishKeyword(keyword)) {
      this.logger.info('Skipping non-English keyword', { keyword });
      return ok([]);
    }

    if (siteOwner(site.name) !== this.name) {
      this.logger.debug('Site belongs to another plugin', { site: site.name });
      return ok([]);
    }

    const indexerId = resolveIndexerId(site);
    if (!indexerId) {
      this.logger.warn('Site has no indexer id', { site: site.name, domain: site.domain });
      return ok([]);
    }

    if (!this.client) {
      return err(pluginError('upstream_unavailable', `${this.upstreamName} is not configured`));
    }

    this.logger.info('Searching', { site: site.name, keyword, mtype: request.mtype, page: request.page ?? 0 });

    const result = await this.client.search(indexerId, { ...request, keyword }, site.name);
    if (!result.ok) {
      this.logger.error('Search failed', { site: site.name, kind: result.error.kind, error: result.error.message });
      return result;
    }

    this.logger.info('Search complete', { site: site.name, results: result.value.length });
    return result;
  }

  async search(site: SiteRecord, request: SearchRequest): Promise<TorrentRecord[]> {
    const result = await this.searchDetailed(site, request);
    return result.ok ? result.value : [];
  }

  /** Searches every known indexer, or only the one whose id, name or site name matches `indexer`. */
  async searchAll(keyword: string, options: SearchAllOptions = {}): Promise<TorrentRecord[]> {
    const wanted = options.indexer?.toLowerCase();
    const sites = wanted
      ? this.state.indexers.filter(site =>
        site.indexerId.toLowerCase() === wanted
        || site.indexerName.toLowerCase() === wanted
        || site.name.toLowerCase() === wanted)
      : this.state.indexers;

    const results = await Promise.all(
      sites.map(site => this.search(site, { keyword, mtype: options.mtype, page: options.page ?? 0 }))
    );
    return results.flat();
  }

  async stop(): Promise<void> {
    if (this.state.indexers.length > 0) {
      this.logger.info('Service stopped, sites stay registered', { indexers: this.state.indexers.length });
    }
    this.state = { ...this.state, indexers: [] };
  }

  getSearchProvider(): SearchProvider | null {
    return this.state.settings.enabled ? this : null;
  }

  getServices(): PluginService[] {
    const { enabled, cron } = this.state.settings;
    if (!enabled || !this.client || !cron) {
      return [];
    }

    return [{
      id: 'sync-indexers',
      name: `${this.upstreamName} indexer sync`,
      trigger: { type: 'cron', expression: cron },
      run: async () => {
        await this.syncIndexers();
      },
    }];
  }

  getForm(): UiNode[] {
    return [
      form(
        row(
          col({ md: 6 }, switchField('enabled', 'Enable plugin', `Search through ${this.upstreamName}`)),
          col({ md: 6 }, switchField('onlyonce', 'Run once', 'Sync the indexer list right away')),
        ),
        row(
          col({ md: 6 }, textField('host', 'Server URL', {
            placeholder: this.hostPlaceholder(),
            hint: `${this.upstreamName} address, e.g. ${this.hostPlaceholder()}`,
          })),
          col({ md: 6 }, textField('apiKey', 'API key', {
            placeholder: '',
            hint: `Found in the ${this.upstreamName} settings`,
            secret: true,
          })),
        ),
        row(
          col({ md: 6 }, textField('cron', 'Sync schedule', {
            placeholder: DEFAULT_INDEXER_SYNC_CRON,
            hint: 'Cron expression; the indexer list is synced every 6 hours by default',
          })),
          col({ md: 6 }, switchField('proxy', 'Use proxy', `Reach ${this.upstreamName} through the system proxy`)),
        ),
        row(
          col({}, alert('info', `Indexers configured in ${this.upstreamName} are registered as sites. Searches on those sites are answered by the ${this.upstreamName} API.`)),
        ),
      ),
    ];
  }

  protected abstract hostPlaceholder(): string;

  getPage(): UiNode[] {
    const { enabled } = this.state.settings;
    const status = [enabled ? 'Status: running' : 'Status: stopped'];
    if (this.state.lastUpdate) {
      status.push(`Last sync: ${formatDateTime(this.state.lastUpdate)}`);
    }
    status.push(`Indexers: ${this.state.indexers.length}`);

    return [
      row(col({}, alert(enabled ? 'success' : 'info', status.join(' | ')))),
      row(col({}, table(
        ['Indexer', 'Site domain', 'Public'],
        this.state.indexers.map(site => [site.indexerName || site.name, site.domain, site.public ? 'Yes' : 'No'])
      ))),
    ];
  }

  getApi(): PluginApiRoute[] {
    return [
      {
        path: '/indexers',
        method: 'GET',
        summary: `List the registered ${this.upstreamName} indexers`,
        handler: async () => this.getIndexers(),
      },
      {
        path: '/sync',
        method: 'POST',
        summary: `Sync indexers from ${this.upstreamName}`,
        handler: async () => {
          const result = await this.syncIndexers();
          return result.ok
            ? { success: true, ...result.value }
            : { success: false, error: result.error.message, kind: result.error.kind };
        },
      },
      {
        path: '/search',
        method: 'GET',
        summary: `Search all ${this.upstreamName} indexers`,
        handler: async ({ query }) => {
          const keyword = query.keyword?.trim() ?? '';
          if (!keyword) {
            return { results: [], count: 0 };
          }
          const results = await this.searchAll(keyword, {
            indexer: query.indexer,
            mtype: toMediaType(query.mtype),
            page: toPage(query.page),
          });
          return { results, count: results.length };
        },
      },
    ];
  }

  getAgentTools(): AgentTool[] {
    return [this.searchTool(), this.listIndexersTool()];
  }

  private searchTool(): AgentTool {
    return {
      name: `${this.toolPrefix}_search_torrents`,
      description:
        `Search for torrents across all ${this.upstreamName} indexers. `
        + 'Supports keyword search and IMDb ID search (format: tt1234567). '
        + 'Can filter by media type (movie/tv) and a specific indexer.',
      parameters: [
        { name: 'keyword', type: 'string', description: 'Search keyword or IMDb ID', required: true },
        { name: 'mtype', type: 'string', description: "Media type: 'movie' or 'tv'; empty searches both", required: false },
        { name: 'indexer', type: 'string', description: 'Indexer id or name; empty searches all indexers', required: false },
      ],
      describe: (input) => {
        const parsed = searchToolInput.safeParse(input);
        if (!parsed.success) return `Searching ${this.upstreamName}`;
        let message = `Searching ${this.upstreamName}: ${parsed.data.keyword}`;
        if (parsed.data.mtype) message += ` (type: ${parsed.data.mtype})`;
        if (parsed.data.indexer) message += ` (indexer: ${parsed.data.indexer})`;
        return message;
      },
      run: async (input) => {
        if (!this.getState()) {
          return `❌ ${this.upstreamName} plugin is not enabled`;
        }

        const parsed = searchToolInput.safeParse(input);
        if (!parsed.success) {
          return `❌ Invalid input: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ')}`;
        }

        const { keyword, mtype, indexer } = parsed.data;
        const results = await this.searchAll(keyword, { mtype, indexer, page: 0 });
        if (results.length === 0) {
          return `📭 No results for '${keyword}'`;
        }

        const top = [...results].sort((a, b) => b.seeders - a.seeders).slice(0, MAX_TOOL_RESULTS);
        const lines = [`✅ Found ${results.length} results, showing the first ${top.length}:\n`];

        top.forEach((torrent, index) => {
          let entry = `${index + 1}. ${torrent.title}\n`
            + `   Size: ${bytesToGb(torrent.size)}GB | Seeders: ${torrent.seeders} | Leechers: ${torrent.peers}\n`
            + `   Site: ${torrent.siteName}`;
          if (torrent.grabs) {
            entry += ` | Grabs: ${torrent.grabs}`;
          }
          lines.push(entry);

          const promo: string[] = [];
          if (torrent.downloadVolumeFactor === 0) {
            promo.push('🆓');
          } else if (torrent.downloadVolumeFactor === 0.5) {
            promo.push('50%');
          }
          if (torrent.uploadVolumeFactor === 2) {
            promo.push('2xUp');
          }
          if (promo.length > 0) {
            lines.push(`   Promo: ${promo.join(' ')}`);
          }

          lines.push('');
        });

        return lines.join('\n');
      },
    };
  }

  private listIndexersTool(): AgentTool {
    return {
      name: `${this.toolPrefix}_list_indexers`,
      description: `List the ${this.upstreamName} indexers registered as sites and available for searching.`,
      parameters: [],
      describe: () => `Listing ${this.upstreamName} indexers`,
      run: async () => {
        if (!this.getState()) {
          return `❌ ${this.upstreamName} plugin is not enabled`;
        }

        const indexers = this.state.indexers;
        if (indexers.length === 0) {
          return `📋 No ${this.upstreamName} indexers registered`;
        }

        const privateCount = indexers.filter(site => site.privacy === 'private').length;
        const semiPrivateCount = indexers.filter(site => site.privacy === 'semi-private').length;

        const lines = [
          `📋 **${this.upstreamName} indexers**`,
          `${indexers.length} indexers (private: ${privateCount} | semi-private: ${semiPrivateCount})\n`,
        ];
        indexers.forEach((site, index) => {
          lines.push(`${index + 1}. ${privacyIcon(site.privacy)} ${siteTitle(site.name, this.name)} (${site.indexerId})`);
        });

        return lines.join('\n');
      },
    };
  }
}
