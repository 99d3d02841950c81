/**
 * In-memory media host for sync tests
 */

import { err, ok, pluginError, type Result } from '@mediabridge/plugin-utils';
import type { SyncCollaborators } from '../src/collaborators.js';
import type { DownloadOutcome, MediaInfo, Notification, RecognizeRequest } from '../src/types.js';

export class FakeMediaHost {
  /** Titles the recognizer knows, by TMDB id */
  readonly known = new Map<number, MediaInfo>();
  readonly library = new Set<number>();
  readonly subscribed = new Set<number>();
  readonly downloads = new Map<number, DownloadOutcome>();
  /** TMDB ids whose subscription is refused */
  readonly refused = new Set<number>();

  readonly subscribeCalls: Array<{ tmdbId: number; username: string }> = [];
  readonly downloadCalls: number[] = [];
  readonly notifications: Notification[] = [];

  learn(type: MediaInfo['type'], title: string, year: number, tmdbId: number): this {
    this.known.set(tmdbId, { type, title, year, tmdbId, imdbId: '' });
    return this;
  }

  collaborators(): SyncCollaborators {
    return {
      recognizer: {
        recognize: async (request: RecognizeRequest): Promise<Result<MediaInfo | null>> =>
          ok(this.known.get(request.tmdbId) ?? null),
      },
      library: {
        exists: async (media: MediaInfo): Promise<Result<boolean>> => ok(this.library.has(media.tmdbId)),
      },
      subscriptions: {
        isSubscribed: async (media: MediaInfo): Promise<Result<boolean>> => ok(this.subscribed.has(media.tmdbId)),
        subscribe: async (media: MediaInfo, username: string): Promise<Result<string>> => {
          this.subscribeCalls.push({ tmdbId: media.tmdbId, username });
          if (this.refused.has(media.tmdbId)) {
            return err(pluginError('upstream_unavailable', 'Subscription quota reached'));
          }
          this.subscribed.add(media.tmdbId);
          return ok(`sub-${media.tmdbId}`);
        },
      },
      downloader: {
        searchAndDownload: async (media: MediaInfo): Promise<Result<DownloadOutcome>> => {
          this.downloadCalls.push(media.tmdbId);
          return ok(this.downloads.get(media.tmdbId) ?? { downloaded: 0, remaining: true });
        },
      },
      notifier: {
        notify: async (notification: Notification): Promise<Result<void>> => {
          this.notifications.push(notification);
          return ok(undefined);
        },
      },
    };
  }
}
