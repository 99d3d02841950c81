/**
 * Prowlarr Indexer Plugin
 * Registers Prowlarr's enabled indexers as sites and answers their searches
 * through the Prowlarr REST API
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
import { ProwlarrClient } from './client.js';
import type { ProwlarrSystemStatus } from './schemas.js';

export const PROWLARR_PLUGIN_ID = 'prowlarr-indexer';
export const PROWLARR_DOMAIN_PREFIX = 'prowlarr_indexer';

export interface ProwlarrPluginOptions {
  retryConfig?: RetryConfig;
}

export class ProwlarrIndexerPlugin extends IndexerPlugin<ProwlarrClient> {
  readonly id = PROWLARR_PLUGIN_ID;
  readonly name = 'Prowlarr';
  readonly version = '1.0.0';
  readonly description = 'Search through the indexers enabled in Prowlarr';
  readonly domainPrefix = PROWLARR_DOMAIN_PREFIX;
  protected readonly toolPrefix = 'prowlarr';
  protected readonly upstreamName = 'Prowlarr';
  protected readonly englishOnly = false;

  private readonly retryConfig?: RetryConfig;

  constructor(options: ProwlarrPluginOptions = {}) {
    super('prowlarr-indexer');
    this.retryConfig = options.retryConfig;
  }

  protected createClient(settings: IndexerSettings): ProwlarrClient {
    return new ProwlarrClient({
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
      url: `${settings.host}/api/v1/indexer/${indexer.id}`,
      public: indexer.privacy !== 'private',
      proxy: settings.proxy,
      indexerId: indexer.id,
      indexerName: indexer.title,
      privacy: indexer.privacy,
    };
  }

  protected hostPlaceholder(): string {
    return 'http://127.0.0.1:9696';
  }

  async getSystemStatus(): Promise<Result<ProwlarrSystemStatus>> {
    if (!this.client) {
      return err(pluginError('upstream_unavailable', 'Prowlarr is not configured'));
    }
    return this.client.getSystemStatus();
  }

  getApi(): PluginApiRoute[] {
    return [
      ...super.getApi(),
      {
        path: '/system',
        method: 'GET',
        summary: 'Prowlarr version and instance name',
        handler: async () => {
          const status = await this.getSystemStatus();
          return status.ok
            ? { success: true, status: status.value }
            : { success: false, error: status.error.message, kind: status.error.kind };
        },
      },
    ];
  }
}
