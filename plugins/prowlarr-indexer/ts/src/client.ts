/**
 * Prowlarr REST API Client
 */

import {
  HttpClient,
  categoriesForMediaType,
  err,
  formatZodError,
  ok,
  pluginError,
  type IndexerClient,
  type RetryConfig,
  type Result,
  type SearchRequest,
  type TorrentRecord,
  type UpstreamIndexer,
} from '@mediabridge/plugin-utils';
import { parseIndexers, parseReleases } from './releases.js';
import { systemStatusSchema, type ProwlarrSystemStatus } from './schemas.js';

const LIST_TIMEOUT_MS = 30000;
const SEARCH_TIMEOUT_MS = 60000;
const PAGE_SIZE = 100;

export interface ProwlarrClientOptions {
  host: string;
  apiKey: string;
  proxy?: boolean;
  retryConfig?: RetryConfig;
}

export class ProwlarrClient implements IndexerClient {
  private readonly http: HttpClient;

  constructor(options: ProwlarrClientOptions) {
    this.http = new HttpClient({
      baseUrl: options.host,
      headers: { 'X-Api-Key': options.apiKey },
      useProxy: options.proxy ?? false,
      retryConfig: options.retryConfig,
    });
  }

  /** Indexers enabled in Prowlarr */
  async listIndexers(): Promise<Result<UpstreamIndexer[]>> {
    const response = await this.http.getJson('/api/v1/indexer', { timeout: LIST_TIMEOUT_MS });
    return response.ok ? parseIndexers(response.value) : response;
  }

  async search(indexerId: string, request: SearchRequest, siteName: string): Promise<Result<TorrentRecord[]>> {
    const page = request.page ?? 0;
    const response = await this.http.getJson('/api/v1/search', {
      params: {
        query: request.keyword,
        indexerIds: indexerId,
        type: 'search',
        limit: PAGE_SIZE,
        offset: page * PAGE_SIZE,
        categories: categoriesForMediaType(request.mtype),
      },
      timeout: SEARCH_TIMEOUT_MS,
    });
    return response.ok ? parseReleases(response.value, siteName) : response;
  }

  async getSystemStatus(): Promise<Result<ProwlarrSystemStatus>> {
    const response = await this.http.getJson('/api/v1/system/status', { timeout: LIST_TIMEOUT_MS });
    if (!response.ok) {
      return response;
    }

    const parsed = systemStatusSchema.safeParse(response.value);
    return parsed.success
      ? ok(parsed.data)
      : err(pluginError('malformed_response', `Unexpected system status: ${formatZodError(parsed.error)}`));
  }
}
