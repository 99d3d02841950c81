/**
 * Trakt API Client
 * OAuth token grants plus the watchlist and list endpoints
 */

import {
  HttpClient,
  createLogger,
  err,
  formatZodError,
  ok,
  pluginError,
  type Result,
  type RetryConfig,
} from '@mediabridge/plugin-utils';
import { traktListItemSchema, traktTokenSchema, traktUserSettingsSchema, type TraktListItem, type TraktToken, type WatchlistEntry } from './types.js';

const logger = createLogger('trakt-sync:client');

export const TRAKT_API_URL = 'https://api.trakt.tv';
export const TRAKT_API_VERSION = '2';
/** Out-of-band redirect for codes pasted in by the user */
export const OOB_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';

export type WatchlistKind = 'movies' | 'shows';

export interface TraktClientOptions {
  clientId: string;
  clientSecret: string;
  baseUrl?: string;
  proxy?: boolean;
  retryConfig?: RetryConfig;
}

/** The OAuth side of the client, as the token manager uses it */
export interface TokenGrants {
  exchangeCode(code: string): Promise<Result<TraktToken>>;
  refreshToken(refreshToken: string): Promise<Result<TraktToken>>;
}

function parseToken(body: unknown): Result<TraktToken> {
  const parsed = traktTokenSchema.safeParse(body);
  return parsed.success
    ? ok(parsed.data)
    : err(pluginError('malformed_response', `Unexpected token response: ${formatZodError(parsed.error)}`));
}

/**
 * Movies and shows from a list body. Seasons, episodes and people are not
 * synced and are dropped here.
 */
export function toWatchlistEntries(body: unknown, source: string): Result<WatchlistEntry[]> {
  if (!Array.isArray(body)) {
    return err(pluginError('malformed_response', `${source} is not a list`));
  }

  const entries: WatchlistEntry[] = [];
  for (const raw of body) {
    const parsed = traktListItemSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug('Skipping malformed list item', { source, error: formatZodError(parsed.error) });
      continue;
    }

    const entry = toEntry(parsed.data, source);
    if (entry) {
      entries.push(entry);
    } else {
      logger.debug('Skipping list item', { source, type: parsed.data.type });
    }
  }
  return ok(entries);
}

function toEntry(item: TraktListItem, source: string): WatchlistEntry | null {
  const media = item.type === 'movie' ? item.movie : item.type === 'show' ? item.show : null;
  if (!media) {
    return null;
  }

  return {
    type: item.type === 'movie' ? 'movie' : 'tv',
    title: media.title ?? '',
    year: media.year ?? null,
    tmdbId: media.ids.tmdb ?? null,
    imdbId: media.ids.imdb ?? '',
    source,
  };
}

export class TraktClient implements TokenGrants {
  private readonly http: HttpClient;
  private readonly clientId: string;
  private readonly clientSecret: string;

  constructor(options: TraktClientOptions) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.http = new HttpClient({
      baseUrl: options.baseUrl ?? TRAKT_API_URL,
      headers: {
        'trakt-api-key': options.clientId,
        'trakt-api-version': TRAKT_API_VERSION,
      },
      useProxy: options.proxy ?? false,
      retryConfig: options.retryConfig,
    });
  }

  // ===========================================================================
  // OAuth
  // ===========================================================================

  /** Trades an authorization code for the first token pair */
  async exchangeCode(code: string): Promise<Result<TraktToken>> {
    const response = await this.http.postJson('/oauth/token', {
      code,
      client_id: this.clientId,
      client_secret: this.clientSecret,
      redirect_uri: OOB_REDIRECT_URI,
      grant_type: 'authorization_code',
    }, { retry: false });
    return response.ok ? parseToken(response.value) : response;
  }

  /** One refresh_token grant; never retried */
  async refreshToken(refreshToken: string): Promise<Result<TraktToken>> {
    const response = await this.http.postJson('/oauth/token', {
      refresh_token: refreshToken,
      client_id: this.clientId,
      client_secret: this.clientSecret,
      redirect_uri: OOB_REDIRECT_URI,
      grant_type: 'refresh_token',
    }, { retry: false });
    return response.ok ? parseToken(response.value) : response;
  }

  // ===========================================================================
  // Lists
  // ===========================================================================

  async getWatchlist(accessToken: string, kind: WatchlistKind): Promise<Result<WatchlistEntry[]>> {
    const response = await this.http.getJson(`/sync/watchlist/${kind}`, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    return response.ok ? toWatchlistEntries(response.value, 'watchlist') : response;
  }

  async getListItems(accessToken: string, user: string, listId: string): Promise<Result<WatchlistEntry[]>> {
    const path = `/users/${encodeURIComponent(user)}/lists/${encodeURIComponent(listId)}/items`;
    const response = await this.http.getJson(path, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    return response.ok ? toWatchlistEntries(response.value, `${user}/${listId}`) : response;
  }

  /** The user the access token belongs to */
  async getUsername(accessToken: string): Promise<Result<string>> {
    const response = await this.http.getJson('/users/settings', {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    if (!response.ok) {
      return response;
    }

    const parsed = traktUserSettingsSchema.safeParse(response.value);
    return parsed.success
      ? ok(parsed.data.user.username)
      : err(pluginError('malformed_response', `Unexpected user settings: ${formatZodError(parsed.error)}`));
  }
}
