/**
 * Host media services the watchlist sync relies on
 */

import type { Result } from '@mediabridge/plugin-utils';
import type { DownloadOutcome, MediaInfo, Notification, RecognizeRequest } from './types.js';

export interface MediaRecognizer {
  /** `null` when the host does not know the title */
  recognize(request: RecognizeRequest): Promise<Result<MediaInfo | null>>;
}

export interface MediaLibrary {
  /** Whether the library already holds the movie, or every episode of the show */
  exists(media: MediaInfo): Promise<Result<boolean>>;
}

export interface SubscriptionService {
  isSubscribed(media: MediaInfo): Promise<Result<boolean>>;
  /** Returns the subscription id */
  subscribe(media: MediaInfo, username: string): Promise<Result<string>>;
}

export interface MediaDownloader {
  searchAndDownload(media: MediaInfo, username: string): Promise<Result<DownloadOutcome>>;
}

export interface Notifier {
  notify(notification: Notification): Promise<Result<void>>;
}

export interface SyncCollaborators {
  recognizer: MediaRecognizer;
  library: MediaLibrary;
  subscriptions: SubscriptionService;
  downloader: MediaDownloader;
  notifier: Notifier;
}
