/**
 * Jackett Torznab API Client
 */

import {
  HttpClient,
  categoriesForMediaType,
  createLogger,
  type IndexerClient,
  type RetryConfig,
  type Result,
  type SearchRequest,
  type TorrentRecord,
} from '@mediabridge/plugin-utils';
import { parseCaps, parseIndexers, parseItems } from './torznab.js';
import type { JackettIndexer, TorznabCaps } from './types.js';

const logger = createLogger('jackett-indexer:client');

const LIST_TIMEOUT_MS = 30000;
const SEARCH_TIMEOUT_MS = 60000;
const PAGE_SIZE = 100;

export interface JackettClientOptions {
  host: string;
  apiKey: string;
  proxy?: boolean;
  retryConfig?: RetryConfig;
}

function torznabPath(indexerId: string): string {
  return `/api/v2.0/indexers/${encodeURIComponent(indexerId)}/results/torznab/api`;
}

export class JackettClient implements IndexerClient {
  private readonly http: HttpClient;
  private readonly apiKey: string;

  constructor(options: JackettClientOptions) {
    this.apiKey = options.apiKey;
    this.http = new HttpClient({
      baseUrl: options.host,
      useProxy: options.proxy ?? false,
      retryConfig: options.retryConfig,
    });
  }

  /** Indexers configured in Jackett */
  async listIndexers(): Promise<Result<JackettIndexer[]>> {
    const response = await this.http.getText(torznabPath('all'), {
      params: { apikey: this.apiKey, t: 'indexers', configured: 'true' },
      timeout: LIST_TIMEOUT_MS,
    });
    if (!response.ok) {
      return response;
    }

    const indexers = parseIndexers(response.value);
    if (indexers.ok) {
      logger.info(`Fetched ${indexers.value.length} indexers`);
    }
    return indexers;
  }

  async search(indexerId: string, request: SearchRequest, siteName: string): Promise<Result<TorrentRecord[]>> {
    const page = request.page ?? 0;
    const response = await this.http.getText(torznabPath(indexerId), {
      params: {
        apikey: this.apiKey,
        t: 'search',
        q: request.keyword,
        cat: categoriesForMediaType(request.mtype).join(','),
        limit: PAGE_SIZE,
        offset: page * PAGE_SIZE,
      },
      timeout: SEARCH_TIMEOUT_MS,
    });
    if (!response.ok) {
      return response;
    }

    return parseItems(response.value, siteName);
  }

  async getCaps(indexerId: string): Promise<Result<TorznabCaps>> {
    const response = await this.http.getText(torznabPath(indexerId), {
      params: { apikey: this.apiKey, t: 'caps' },
      timeout: LIST_TIMEOUT_MS,
    });
    return response.ok ? parseCaps(response.value) : response;
  }
}
