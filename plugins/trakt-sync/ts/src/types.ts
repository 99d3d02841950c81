/**
 * Trakt Sync Plugin Types
 */

import { z } from 'zod';
import type { MediaType } from '@mediabridge/plugin-utils';

// =============================================================================
// Trakt API
// =============================================================================

export const traktIdsSchema = z.object({
  trakt: z.number().nullish(),
  slug: z.string().nullish(),
  imdb: z.string().nullish(),
  tmdb: z.number().nullish(),
  tvdb: z.number().nullish(),
});

export const traktMediaSchema = z.object({
  title: z.string().nullish(),
  year: z.number().nullish(),
  ids: traktIdsSchema.default({}),
});

export type TraktMedia = z.infer<typeof traktMediaSchema>;

/** One entry of a watchlist or of a user list */
export const traktListItemSchema = z.object({
  rank: z.number().nullish(),
  listed_at: z.string().nullish(),
  type: z.string(),
  movie: traktMediaSchema.nullish(),
  show: traktMediaSchema.nullish(),
});

export type TraktListItem = z.infer<typeof traktListItemSchema>;

export const traktTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  /** Seconds */
  expires_in: z.number().nullish(),
  token_type: z.string().nullish(),
  scope: z.string().nullish(),
  created_at: z.number().nullish(),
});

export type TraktToken = z.infer<typeof traktTokenSchema>;

export const traktUserSettingsSchema = z.object({
  user: z.object({ username: z.string() }),
});

// =============================================================================
// Sync
// =============================================================================

export interface WatchlistEntry {
  type: MediaType;
  title: string;
  year: number | null;
  tmdbId: number | null;
  imdbId: string;
  /** Where the entry came from: `watchlist` or `<user>/<list id>` */
  source: string;
}

export interface CustomList {
  user: string;
  listId: string;
}

export interface TokenState {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date | null;
}

export interface SyncStats {
  moviesAdded: number;
  showsAdded: number;
  moviesExisting: number;
  showsExisting: number;
  /** Entries without a TMDB id or that the host could not recognize */
  skipped: number;
  errors: number;
}

export interface SyncResult {
  success: boolean;
  stats: SyncStats;
  errors: string[];
  duration: number;
}

export interface SyncOptions {
  /** Search and download instead of only subscribing */
  download?: boolean;
}

export type EntryOutcome = 'added' | 'existing' | 'skipped';

// =============================================================================
// Host media services
// =============================================================================

export interface MediaInfo {
  type: MediaType;
  title: string;
  year: number | null;
  tmdbId: number;
  imdbId: string;
}

export interface RecognizeRequest {
  type: MediaType;
  title: string;
  year: number | null;
  tmdbId: number;
}

export interface DownloadOutcome {
  /** Torrents handed to the downloader */
  downloaded: number;
  /** Whether episodes or the movie are still missing afterwards */
  remaining: boolean;
}

export interface Notification {
  title: string;
  text: string;
}
