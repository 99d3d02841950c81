/**
 * Torznab XML parsing
 *
 * Jackett answers every Torznab call with XML: an `<indexers>` list for
 * `t=indexers`, an RSS `<channel>` for searches, `<caps>` for capabilities,
 * and an `<error code description>` document when the call failed.
 */

import * as cheerio from 'cheerio';
import {
  createLogger,
  computeLeechers,
  err,
  formatImdbId,
  ok,
  parseRfc2822Date,
  pluginError,
  toCount,
  toFloat,
  volumeFactorsFromFlags,
  type IndexerPrivacy,
  type Result,
  type TorrentRecord,
} from '@mediabridge/plugin-utils';
import type { JackettIndexer, TorznabCaps, TorznabCategory, TorznabItem, TorznabSearchMode } from './types.js';

const logger = createLogger('jackett-indexer:torznab');

type XmlDocument = cheerio.CheerioAPI;

function loadXml(xml: string): XmlDocument {
  return cheerio.load(xml, { xml: true });
}

/** The `<error>` root Jackett sends instead of a feed, if there is one */
function torznabError($: XmlDocument): Result<null> {
  const error = $.root().children('error').first();
  if (error.length === 0) {
    return ok(null);
  }

  const code = error.attr('code') ?? '';
  const description = error.attr('description') ?? 'unknown error';
  const message = code ? `Torznab error ${code}: ${description}` : `Torznab error: ${description}`;
  return err(pluginError('upstream_unavailable', message));
}

export function toPrivacy(type: string): IndexerPrivacy {
  const normalized = type.trim().toLowerCase();
  if (normalized === 'public') return 'public';
  if (normalized === 'semi-public' || normalized === 'semi-private') return 'semi-private';
  return 'private';
}

export function parseIndexers(xml: string): Result<JackettIndexer[]> {
  const $ = loadXml(xml);

  const failure = torznabError($);
  if (!failure.ok) {
    return failure;
  }

  const root = $.root().children('indexers').first();
  if (root.length === 0) {
    return err(pluginError('malformed_response', 'Expected an <indexers> document'));
  }

  const indexers: JackettIndexer[] = [];
  root.find('indexer').each((_, el) => {
    const $indexer = $(el);
    const id = ($indexer.attr('id') ?? '').trim();
    const title = $indexer.children('title').first().text().trim();
    if (!id || !title) {
      logger.debug('Skipping indexer without id or title', { id, title });
      return;
    }

    const type = $indexer.attr('type') ?? $indexer.children('type').first().text().trim();
    const language = $indexer.attr('language') || $indexer.children('language').first().text().trim() || 'en-US';
    indexers.push({ id, title, type, language, privacy: toPrivacy(type) });
  });

  return ok(indexers);
}

/**
 * Maps one Torznab item to a torrent record. Items without a title or a
 * download link are skipped.
 */
export function mapTorznabItem(item: TorznabItem, siteName: string): Result<TorrentRecord> {
  const title = item.title.trim();
  if (!title) {
    return err(pluginError('item_skipped', 'Item has no title'));
  }

  const enclosure = item.attrs.magneturl || item.enclosureUrl || item.link;
  if (!enclosure) {
    return err(pluginError('item_skipped', `Item "${title}" has no download link`));
  }

  const seeders = toCount(item.attrs.seeders);
  const flags = volumeFactorsFromFlags([...item.tags, ...(item.attrs.flags ? [item.attrs.flags] : [])]);

  return ok({
    title,
    enclosure,
    description: item.description,
    size: toCount(item.size, toCount(item.attrs.size, toCount(item.enclosureLength))),
    seeders,
    peers: computeLeechers(toCount(item.attrs.peers), seeders),
    pageUrl: item.comments || item.guid,
    siteName,
    pubDate: parseRfc2822Date(item.pubDate),
    imdbId: formatImdbId(item.attrs.imdbid || item.attrs.imdb),
    downloadVolumeFactor: toFloat(item.attrs.downloadvolumefactor, flags.download),
    uploadVolumeFactor: toFloat(item.attrs.uploadvolumefactor, flags.upload),
    grabs: toCount(item.attrs.grabs),
  });
}

export function parseItems(xml: string, siteName: string): Result<TorrentRecord[]> {
  const $ = loadXml(xml);

  const failure = torznabError($);
  if (!failure.ok) {
    return failure;
  }

  const channel = $('channel').first();
  if (channel.length === 0) {
    logger.debug('Feed has no channel', { site: siteName });
    return ok([]);
  }

  const records: TorrentRecord[] = [];
  channel.children('item').each((_, el) => {
    const $item = $(el);
    const child = (name: string) => $item.children(name).first().text().trim();
    const enclosure = $item.children('enclosure').first();

    const attrs: Record<string, string> = {};
    const tags: string[] = [];
    $item.children().each((_, attrEl) => {
      const tagName = attrEl.name.toLowerCase();
      if (tagName !== 'torznab:attr' && tagName !== 'newznab:attr') {
        return;
      }
      const name = ($(attrEl).attr('name') ?? '').toLowerCase();
      const value = $(attrEl).attr('value') ?? '';
      if (name === 'tag') {
        tags.push(value);
      } else if (name) {
        attrs[name] = value;
      }
    });

    const item: TorznabItem = {
      title: child('title'),
      link: child('link'),
      enclosureUrl: enclosure.attr('url') ?? '',
      enclosureLength: enclosure.attr('length') ?? '',
      size: child('size'),
      description: child('description'),
      comments: child('comments'),
      guid: child('guid'),
      pubDate: child('pubDate'),
      attrs,
      tags,
    };

    const mapped = mapTorznabItem(item, siteName);
    if (mapped.ok) {
      records.push(mapped.value);
    } else {
      logger.debug('Skipping item', { site: siteName, reason: mapped.error.message });
    }
  });

  return ok(records);
}

function splitParams(value: string | undefined): string[] {
  return (value ?? '').split(',').map(param => param.trim()).filter(param => param.length > 0);
}

export function parseCaps(xml: string): Result<TorznabCaps> {
  const $ = loadXml(xml);

  const failure = torznabError($);
  if (!failure.ok) {
    return failure;
  }

  const caps = $.root().children('caps').first();
  if (caps.length === 0) {
    return err(pluginError('malformed_response', 'Expected a <caps> document'));
  }

  const limits = caps.children('limits').first();

  const searchModes: TorznabSearchMode[] = [];
  caps.children('searching').first().children().each((_, el) => {
    const $mode = $(el);
    searchModes.push({
      mode: el.name,
      available: $mode.attr('available') === 'yes',
      supportedParams: splitParams($mode.attr('supportedParams')),
    });
  });

  const categories: TorznabCategory[] = [];
  caps.children('categories').first().children('category').each((_, el) => {
    const $category = $(el);
    const subcategories: TorznabCategory['subcategories'] = [];
    $category.children('subcat').each((_, sub) => {
      subcategories.push({ id: toCount($(sub).attr('id')), name: $(sub).attr('name') ?? '' });
    });
    categories.push({
      id: toCount($category.attr('id')),
      name: $category.attr('name') ?? '',
      subcategories,
    });
  });

  return ok({
    serverTitle: caps.children('server').first().attr('title') ?? '',
    limits: {
      max: toCount(limits.attr('max')),
      default: toCount(limits.attr('default')),
    },
    searchModes,
    categories,
  });
}
