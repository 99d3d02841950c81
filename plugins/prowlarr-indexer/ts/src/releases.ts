/**
 * Prowlarr JSON to indexers and torrent records
 */

import {
  computeLeechers,
  createLogger,
  err,
  formatImdbId,
  formatZodError,
  ok,
  parseIsoDate,
  pluginError,
  toCount,
  volumeFactorsFromFlags,
  type IndexerPrivacy,
  type Result,
  type TorrentRecord,
  type UpstreamIndexer,
} from '@mediabridge/plugin-utils';
import { prowlarrIndexerSchema, prowlarrReleaseSchema, type ProwlarrRelease } from './schemas.js';

const logger = createLogger('prowlarr-indexer:releases');

export function toPrivacy(privacy: string | null | undefined): IndexerPrivacy {
  const normalized = (privacy ?? '').trim().toLowerCase().replace(/[\s_-]/g, '');
  if (normalized === 'public') return 'public';
  if (normalized === 'semiprivate' || normalized === 'semipublic') return 'semi-private';
  return 'private';
}

/**
 * Enabled indexers from a `GET /api/v1/indexer` body. Entries that do not
 * look like an indexer are skipped.
 */
export function parseIndexers(body: unknown): Result<UpstreamIndexer[]> {
  if (!Array.isArray(body)) {
    return err(pluginError('malformed_response', 'Indexer list is not an array'));
  }

  const indexers: UpstreamIndexer[] = [];
  let total = 0;
  for (const entry of body) {
    const parsed = prowlarrIndexerSchema.safeParse(entry);
    if (!parsed.success) {
      logger.debug('Skipping malformed indexer', { error: formatZodError(parsed.error) });
      continue;
    }

    total++;
    const indexer = parsed.data;
    if (!indexer.enable) {
      continue;
    }

    indexers.push({
      id: String(indexer.id),
      title: indexer.name?.trim() || `Indexer${indexer.id}`,
      privacy: toPrivacy(indexer.privacy),
      language: indexer.language ?? undefined,
    });
  }

  logger.info(`Found ${indexers.length} enabled indexers (${total} in total)`);
  return ok(indexers);
}

function leechers(release: ProwlarrRelease, seeders: number): number {
  if (release.leechers !== null && release.leechers !== undefined) {
    return toCount(release.leechers);
  }
  return computeLeechers(toCount(release.peers), seeders);
}

/** Releases without a title or a download link are skipped. */
export function mapRelease(release: ProwlarrRelease, siteName: string): Result<TorrentRecord> {
  const title = release.title?.trim() ?? '';
  if (!title) {
    return err(pluginError('item_skipped', 'Release has no title'));
  }

  const enclosure = release.downloadUrl || release.magnetUrl || '';
  if (!enclosure) {
    return err(pluginError('item_skipped', `Release "${title}" has no download link`));
  }

  const seeders = toCount(release.seeders);
  const factors = volumeFactorsFromFlags(release.indexerFlags);

  return ok({
    title,
    enclosure,
    description: release.sortTitle ?? '',
    size: toCount(release.size),
    seeders,
    peers: leechers(release, seeders),
    pageUrl: release.infoUrl || release.guid || '',
    siteName,
    pubDate: parseIsoDate(release.publishDate ?? ''),
    imdbId: formatImdbId(release.imdbId),
    downloadVolumeFactor: factors.download,
    uploadVolumeFactor: factors.upload,
    grabs: toCount(release.grabs),
  });
}

/** Torrent records from a `GET /api/v1/search` body. */
export function parseReleases(body: unknown, siteName: string): Result<TorrentRecord[]> {
  if (!Array.isArray(body)) {
    return err(pluginError('malformed_response', 'Search results are not an array'));
  }

  const records: TorrentRecord[] = [];
  for (const entry of body) {
    const parsed = prowlarrReleaseSchema.safeParse(entry);
    if (!parsed.success) {
      logger.debug('Skipping malformed release', { site: siteName, error: formatZodError(parsed.error) });
      continue;
    }

    const record = mapRelease(parsed.data, siteName);
    if (record.ok) {
      records.push(record.value);
    } else {
      logger.debug('Skipping release', { site: siteName, reason: record.error.message });
    }
  }
  return ok(records);
}
