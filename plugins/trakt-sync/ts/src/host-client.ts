/**
 * Media host REST client
 * Implements the sync collaborators against the host application's API
 */

import {
  HttpClient,
  err,
  formatZodError,
  ok,
  pluginError,
  type Result,
  type RetryConfig,
} from '@mediabridge/plugin-utils';
import { z } from 'zod';
import type {
  MediaDownloader,
  MediaLibrary,
  MediaRecognizer,
  Notifier,
  SubscriptionService,
  SyncCollaborators,
} from './collaborators.js';
import type { DownloadOutcome, MediaInfo, Notification, RecognizeRequest } from './types.js';

export interface MediaHostClientOptions {
  baseUrl: string;
  apiKey: string;
  retryConfig?: RetryConfig;
}

const mediaSchema = z.object({
  type: z.enum(['movie', 'tv']),
  title: z.string(),
  year: z.number().nullish(),
  tmdb_id: z.number(),
  imdb_id: z.string().nullish(),
});

const recognizeSchema = z.object({
  media: mediaSchema.nullable(),
});

const existsSchema = z.object({
  exists: z.boolean(),
});

const subscriptionLookupSchema = z.object({
  subscribed: z.boolean(),
});

const subscribeSchema = z.object({
  success: z.boolean(),
  message: z.string().nullish(),
  data: z.object({ id: z.union([z.number(), z.string()]) }).nullish(),
});

const downloadSchema = z.object({
  downloaded: z.number().int().min(0),
  remaining: z.boolean(),
});

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): Result<T> {
  const parsed = schema.safeParse(body);
  return parsed.success
    ? ok(parsed.data)
    : err(pluginError('malformed_response', `Unexpected ${what} response: ${formatZodError(parsed.error)}`));
}

function mediaParams(media: MediaInfo) {
  return { tmdbid: media.tmdbId, type: media.type };
}

export class MediaHostClient
  implements MediaRecognizer, MediaLibrary, SubscriptionService, MediaDownloader, Notifier {
  private readonly http: HttpClient;

  constructor(options: MediaHostClientOptions) {
    this.http = new HttpClient({
      baseUrl: options.baseUrl,
      headers: { 'X-Api-Key': options.apiKey },
      retryConfig: options.retryConfig,
    });
  }

  async recognize(request: RecognizeRequest): Promise<Result<MediaInfo | null>> {
    const response = await this.http.getJson('/api/v1/media/recognize', {
      params: { tmdbid: request.tmdbId, type: request.type, title: request.title, year: request.year },
    });
    if (!response.ok) {
      return response;
    }

    const parsed = parseWith(recognizeSchema, response.value, 'recognize');
    if (!parsed.ok) {
      return parsed;
    }

    const media = parsed.value.media;
    return ok(media
      ? { type: media.type, title: media.title, year: media.year ?? null, tmdbId: media.tmdb_id, imdbId: media.imdb_id ?? '' }
      : null);
  }

  async exists(media: MediaInfo): Promise<Result<boolean>> {
    const response = await this.http.getJson('/api/v1/library/exists', { params: mediaParams(media) });
    if (!response.ok) {
      return response;
    }
    const parsed = parseWith(existsSchema, response.value, 'library');
    return parsed.ok ? ok(parsed.value.exists) : parsed;
  }

  async isSubscribed(media: MediaInfo): Promise<Result<boolean>> {
    const response = await this.http.getJson('/api/v1/subscribe/lookup', { params: mediaParams(media) });
    if (!response.ok) {
      return response;
    }
    const parsed = parseWith(subscriptionLookupSchema, response.value, 'subscription lookup');
    return parsed.ok ? ok(parsed.value.subscribed) : parsed;
  }

  async subscribe(media: MediaInfo, username: string): Promise<Result<string>> {
    const response = await this.http.postJson('/api/v1/subscribe', {
      name: media.title,
      year: media.year,
      type: media.type,
      tmdbid: media.tmdbId,
      username,
    }, { retry: false });
    if (!response.ok) {
      return response;
    }

    const parsed = parseWith(subscribeSchema, response.value, 'subscribe');
    if (!parsed.ok) {
      return parsed;
    }
    if (!parsed.value.success || !parsed.value.data) {
      return err(pluginError('upstream_unavailable', parsed.value.message || 'Subscription was not created'));
    }
    return ok(String(parsed.value.data.id));
  }

  async searchAndDownload(media: MediaInfo, username: string): Promise<Result<DownloadOutcome>> {
    const response = await this.http.postJson('/api/v1/download/media', {
      ...mediaParams(media),
      title: media.title,
      year: media.year,
      username,
    }, { retry: false, timeout: 300000 });
    return response.ok ? parseWith(downloadSchema, response.value, 'download') : response;
  }

  async notify(notification: Notification): Promise<Result<void>> {
    const response = await this.http.postJson('/api/v1/message', {
      type: 'subscribe',
      title: notification.title,
      text: notification.text,
    }, { retry: false });
    return response.ok ? ok(undefined) : response;
  }

  collaborators(): SyncCollaborators {
    return {
      recognizer: this,
      library: this,
      subscriptions: this,
      downloader: this,
      notifier: this,
    };
  }
}
