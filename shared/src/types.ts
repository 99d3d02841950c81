/**
 * Shared types for mediabridge plugins
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

/** Three attempts in total: the first call and two retries. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

export type MediaType = 'movie' | 'tv';

export const MEDIA_TYPES: readonly MediaType[] = ['movie', 'tv'];

export type IndexerPrivacy = 'public' | 'semi-private' | 'private';

/**
 * A site as the host's site registry stores it.
 *
 * `name` is always `<plugin name>-<indexer title>`; the part before the first
 * hyphen is how a site is routed back to the plugin that registered it.
 * `indexerId` carries the upstream identifier next to the domain so that
 * identifiers containing a dot survive the round trip.
 */
export interface SiteRecord {
  id: string;
  name: string;
  domain: string;
  url: string;
  public: boolean;
  proxy: boolean;
  category?: string;
  indexerId: string;
  indexerName: string;
  privacy: IndexerPrivacy;
}

export interface TorrentRecord {
  title: string;
  enclosure: string;
  description: string;
  size: number;
  seeders: number;
  /** Leechers; upstreams that report total peers are converted on the way in. */
  peers: number;
  pageUrl: string;
  siteName: string;
  pubDate: string;
  imdbId: string;
  downloadVolumeFactor: number;
  uploadVolumeFactor: number;
  grabs: number;
}

export interface SearchRequest {
  keyword: string;
  mtype?: MediaType;
  page?: number;
}
