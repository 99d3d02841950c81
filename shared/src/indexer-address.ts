/**
 * Indexer addressing
 *
 * Every upstream indexer is registered with the host as a site whose domain is
 * `<prefix>.<indexer id>`. Searching needs the id back, so the site also
 * carries it in `indexerId`; decoding the domain is only a fallback for sites
 * registered without it. An id that contains a dot cannot be recovered from
 * the domain alone.
 */

import type { SiteRecord } from './types.js';

export function encodeIndexerDomain(prefix: string, indexerId: string | number): string {
  return `${prefix}.${indexerId}`;
}

export function decodeIndexerDomain(domain: string): string | null {
  const host = domain.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '');
  if (!host) return null;

  const id = host.substring(host.lastIndexOf('.') + 1);
  return id || null;
}

export function resolveIndexerId(site: Pick<SiteRecord, 'domain'> & { indexerId?: string }): string | null {
  if (site.indexerId) {
    return site.indexerId;
  }
  return site.domain ? decodeIndexerDomain(site.domain) : null;
}

/** Site names are `<plugin name>-<title>`; the owner is the part before the first hyphen. */
export function siteOwner(siteName: string): string {
  return siteName.split('-')[0];
}

export function siteTitle(siteName: string, pluginName: string): string {
  const prefix = `${pluginName}-`;
  return siteName.startsWith(prefix) ? siteName.substring(prefix.length) : siteName;
}
