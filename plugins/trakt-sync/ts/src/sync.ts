/**
 * Trakt Watchlist Synchronization Service
 * Turns watchlist and list entries into host subscriptions or downloads
 */

import { createLogger, describeError, type Result } from '@mediabridge/plugin-utils';
import type { TraktClient } from './client.js';
import type { TokenManager } from './oauth.js';
import type { SyncCollaborators } from './collaborators.js';
import type {
  CustomList,
  EntryOutcome,
  MediaInfo,
  Notification,
  SyncOptions,
  SyncResult,
  SyncStats,
  WatchlistEntry,
} from './types.js';

const logger = createLogger('trakt-sync:sync');

/** Name subscriptions and downloads are filed under on the host */
export const SYNC_USERNAME = 'Trakt watchlist';

export const NOTIFICATION_TITLE = 'Trakt watchlist sync complete';

export interface TraktSyncServiceOptions {
  client: TraktClient;
  tokens: TokenManager;
  collaborators: SyncCollaborators;
  customLists?: CustomList[];
  autoDownload?: boolean;
  notify?: boolean;
}

export function emptyStats(): SyncStats {
  return { moviesAdded: 0, showsAdded: 0, moviesExisting: 0, showsExisting: 0, skipped: 0, errors: 0 };
}

/** `user/listId` pairs; malformed entries are dropped */
export function parseCustomLists(values: string[]): CustomList[] {
  const lists: CustomList[] = [];
  for (const value of values) {
    const [user, listId, ...rest] = value.split('/').map(part => part.trim());
    if (user && listId && rest.length === 0) {
      lists.push({ user, listId });
    } else {
      logger.warn('Ignoring custom list, expected user/list', { value });
    }
  }
  return lists;
}

/** Text of the completion notification, or null when there is nothing to report */
export function buildNotification(stats: SyncStats): Notification | null {
  if (stats.moviesAdded + stats.showsAdded === 0 && stats.errors === 0) {
    return null;
  }

  const lines: string[] = [];
  if (stats.moviesAdded > 0) lines.push(`New movies: ${stats.moviesAdded}`);
  if (stats.showsAdded > 0) lines.push(`New shows: ${stats.showsAdded}`);
  const existing = stats.moviesExisting + stats.showsExisting;
  if (existing > 0) lines.push(`Existing: ${existing}`);
  if (stats.errors > 0) lines.push(`Errors: ${stats.errors}`);

  return { title: NOTIFICATION_TITLE, text: lines.join('\n') };
}

class EntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EntryError';
  }
}

function unwrap<T>(result: Result<T>, action: string): T {
  if (!result.ok) {
    throw new EntryError(`${action}: ${result.error.message}`);
  }
  return result.value;
}

function label(entry: { title: string; year: number | null }): string {
  return entry.year ? `${entry.title} (${entry.year})` : entry.title;
}

export class TraktSyncService {
  private readonly client: TraktClient;
  private readonly tokens: TokenManager;
  private readonly host: SyncCollaborators;
  private readonly customLists: CustomList[];
  private readonly autoDownload: boolean;
  private readonly notify: boolean;
  private syncing = false;

  constructor(options: TraktSyncServiceOptions) {
    this.client = options.client;
    this.tokens = options.tokens;
    this.host = options.collaborators;
    this.customLists = options.customLists ?? [];
    this.autoDownload = options.autoDownload ?? false;
    this.notify = options.notify ?? true;
  }

  isSyncing(): boolean {
    return this.syncing;
  }

  async sync(options: SyncOptions = {}): Promise<SyncResult> {
    const stats = emptyStats();
    if (this.syncing) {
      return { success: false, stats, errors: ['Sync already in progress'], duration: 0 };
    }

    this.syncing = true;
    const startTime = Date.now();
    const errors: string[] = [];

    try {
      const token = await this.tokens.ensureFresh();
      if (!token.ok) {
        logger.error('Could not obtain an access token, sync aborted', { error: token.error.message });
        return { success: false, stats, errors: [`Token refresh failed: ${token.error.message}`], duration: Date.now() - startTime };
      }

      const download = options.download ?? this.autoDownload;
      logger.info('Starting Trakt watchlist sync', { download, customLists: this.customLists.length });

      const entries = await this.collectEntries(token.value, stats, errors);

      for (const entry of entries) {
        try {
          const outcome = entry.type === 'movie'
            ? await this.syncMovie(entry, download)
            : await this.syncShow(entry, download);
          this.count(stats, entry, outcome);
        } catch (error) {
          const message = `${label(entry)}: ${describeError(error)}`;
          logger.error('Failed to sync entry', { entry: label(entry), error: describeError(error) });
          errors.push(message);
          stats.errors++;
        }
      }

      if (this.notify) {
        await this.sendNotification(stats);
      }

      logger.success('Trakt watchlist sync complete', { ...stats });
      return { success: true, stats, errors, duration: Date.now() - startTime };
    } finally {
      this.syncing = false;
    }
  }

  /** Watchlists first, then custom lists; later duplicates of a TMDB id are dropped */
  private async collectEntries(accessToken: string, stats: SyncStats, errors: string[]): Promise<WatchlistEntry[]> {
    const sources: Array<{ name: string; fetch: () => Promise<Result<WatchlistEntry[]>> }> = [
      { name: 'movie watchlist', fetch: () => this.client.getWatchlist(accessToken, 'movies') },
      { name: 'show watchlist', fetch: () => this.client.getWatchlist(accessToken, 'shows') },
      ...this.customLists.map(list => ({
        name: `list ${list.user}/${list.listId}`,
        fetch: () => this.client.getListItems(accessToken, list.user, list.listId),
      })),
    ];

    const seen = new Set<string>();
    const entries: WatchlistEntry[] = [];

    for (const source of sources) {
      const result = await source.fetch();
      if (!result.ok) {
        logger.error(`Failed to fetch ${source.name}`, { error: result.error.message });
        errors.push(`${source.name}: ${result.error.message}`);
        stats.errors++;
        continue;
      }

      logger.info(`Fetched ${result.value.length} entries from ${source.name}`);
      for (const entry of result.value) {
        if (entry.tmdbId !== null) {
          const key = `${entry.type}:${entry.tmdbId}`;
          if (seen.has(key)) continue;
          seen.add(key);
        }
        entries.push(entry);
      }
    }

    return entries;
  }

  private async recognize(entry: WatchlistEntry): Promise<MediaInfo | null> {
    if (entry.tmdbId === null) {
      logger.warn('Entry has no TMDB id, skipping', { entry: label(entry), source: entry.source });
      return null;
    }

    const media = unwrap(await this.host.recognizer.recognize({
      type: entry.type,
      title: entry.title,
      year: entry.year,
      tmdbId: entry.tmdbId,
    }), 'recognize');

    if (!media) {
      logger.warn('Host could not recognize entry', { entry: label(entry), tmdbId: entry.tmdbId });
    }
    return media;
  }

  private async syncMovie(entry: WatchlistEntry, download: boolean): Promise<EntryOutcome> {
    const media = await this.recognize(entry);
    if (!media) {
      return 'skipped';
    }

    if (unwrap(await this.host.library.exists(media), 'library lookup')) {
      logger.info('Already in the library', { media: label(media) });
      return 'existing';
    }

    if (unwrap(await this.host.subscriptions.isSubscribed(media), 'subscription lookup')) {
      logger.info('Already subscribed', { media: label(media) });
      return 'existing';
    }

    if (download) {
      const outcome = unwrap(await this.host.downloader.searchAndDownload(media, SYNC_USERNAME), 'search and download');
      if (outcome.downloaded > 0) {
        logger.info('Download started', { media: label(media) });
        return 'added';
      }
      logger.info('Nothing downloaded, subscribing instead', { media: label(media) });
    }

    return this.subscribe(media);
  }

  private async syncShow(entry: WatchlistEntry, download: boolean): Promise<EntryOutcome> {
    const media = await this.recognize(entry);
    if (!media) {
      return 'skipped';
    }

    if (unwrap(await this.host.subscriptions.isSubscribed(media), 'subscription lookup')) {
      logger.info('Already subscribed', { media: label(media) });
      return 'existing';
    }

    if (!download) {
      return this.subscribe(media);
    }

    if (unwrap(await this.host.library.exists(media), 'library lookup')) {
      logger.info('Every episode is in the library', { media: label(media) });
      return 'existing';
    }

    const outcome = unwrap(await this.host.downloader.searchAndDownload(media, SYNC_USERNAME), 'search and download');
    if (outcome.remaining) {
      logger.info('Episodes still missing, subscribing', { media: label(media), downloaded: outcome.downloaded });
      return this.subscribe(media);
    }

    return outcome.downloaded > 0 ? 'added' : 'existing';
  }

  private async subscribe(media: MediaInfo): Promise<EntryOutcome> {
    const id = unwrap(await this.host.subscriptions.subscribe(media, SYNC_USERNAME), 'subscribe');
    logger.info('Subscription added', { media: label(media), id });
    return 'added';
  }

  private count(stats: SyncStats, entry: WatchlistEntry, outcome: EntryOutcome): void {
    const movie = entry.type === 'movie';
    switch (outcome) {
      case 'added':
        if (movie) stats.moviesAdded++;
        else stats.showsAdded++;
        break;
      case 'existing':
        if (movie) stats.moviesExisting++;
        else stats.showsExisting++;
        break;
      case 'skipped':
        stats.skipped++;
        break;
    }
  }

  private async sendNotification(stats: SyncStats): Promise<void> {
    const notification = buildNotification(stats);
    if (!notification) {
      return;
    }

    const sent = await this.host.notifier.notify(notification);
    if (!sent.ok) {
      logger.warn('Failed to send notification', { error: sent.error.message });
    }
  }
}
