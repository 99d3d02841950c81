/**
 * Jackett Indexer Plugin
 * Registers Jackett's configured indexers as sites and answers their searches
 * through the Torznab API
 */

import {
  IndexerPlugin,
  encodeIndexerDomain,
  err,
  pluginError,
  type IndexerSettings,
  type PluginApiRoute,
  type Result,
  type RetryConfig,
  type SiteRecord,
  type UpstreamIndexer,
} from '@mediabridge/plugin-utils';
import { JackettClient } from './client.js';
import type { TorznabCaps } from './types.js';

export const JACKETT_PLUGIN_ID = 'jackett-indexer';
export const JACKETT_DOMAIN_PREFIX = 'jackett_indexer';

export interface JackettPluginOptions {
  retryConfig?: RetryConfig;
}

export class JackettIndexerPlugin extends IndexerPlugin<JackettClient> {
  readonly id = JACKETT_PLUGIN_ID;
  readonly name = 'Jackett';
  readonly version = '1.0.0';
  readonly description = 'Search through the indexers configured in Jackett';
  readonly domainPrefix = JACKETT_DOMAIN_PREFIX;
  protected readonly toolPrefix = 'jackett';
  protected readonly upstreamName = 'Jackett';
  protected readonly englishOnly = true;

  private readonly retryConfig?: RetryConfig;

  constructor(options: JackettPluginOptions = {}) {
    super('jackett-indexer');
    this.retryConfig = options.retryConfig;
  }

  protected createClient(settings: IndexerSettings): JackettClient {
    return new JackettClient({
      host: settings.host,
      apiKey: settings.apiKey,
      proxy: settings.proxy,
      retryConfig: this.retryConfig,
    });
  }

  protected buildSite(indexer: UpstreamIndexer, settings: IndexerSettings): SiteRecord {
    const name = `${this.name}-${indexer.title}`;
    return {
      id: name,
      name,
      domain: encodeIndexerDomain(this.domainPrefix, indexer.id),
      url: `${settings.host}/api/v2.0/indexers/${indexer.id}/results/torznab/`,
      public: indexer.privacy !== 'private',
      proxy: false,
      indexerId: indexer.id,
      indexerName: indexer.title,
      privacy: indexer.privacy,
    };
  }

  protected hostPlaceholder(): string {
    return 'http://127.0.0.1:9117';
  }

  async getCaps(indexerId: string): Promise<Result<TorznabCaps>> {
    if (!this.client) {
      return err(pluginError('upstream_unavailable', 'Jackett is not configured'));
    }
    return this.client.getCaps(indexerId);
  }

  getApi(): PluginApiRoute[] {
    return [
      ...super.getApi(),
      {
        path: '/caps',
        method: 'GET',
        summary: 'Torznab capabilities of one indexer',
        handler: async ({ query }) => {
          const indexer = query.indexer?.trim();
          if (!indexer) {
            return { success: false, error: 'indexer is required' };
          }
          const caps = await this.getCaps(indexer);
          return caps.ok
            ? { success: true, caps: caps.value }
            : { success: false, error: caps.error.message, kind: caps.error.kind };
        },
      },
    ];
  }
}
