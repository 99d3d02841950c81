/**
 * Jackett Indexer Plugin Types
 */

import type { IndexerPrivacy } from '@mediabridge/plugin-utils';

/** Indexer type as reported by `t=indexers` */
export type JackettIndexerType = 'public' | 'semi-public' | 'private' | string;

export interface JackettIndexer {
  id: string;
  title: string;
  type: JackettIndexerType;
  language: string;
  privacy: IndexerPrivacy;
}

/** One `<item>` of a Torznab feed, as written in the XML */
export interface TorznabItem {
  title: string;
  link: string;
  enclosureUrl: string;
  enclosureLength: string;
  size: string;
  description: string;
  comments: string;
  guid: string;
  pubDate: string;
  /** `torznab:attr` values by lower-cased name; `tag` attributes are collected in `tags` */
  attrs: Record<string, string>;
  tags: string[];
}

export interface TorznabSearchMode {
  mode: string;
  available: boolean;
  supportedParams: string[];
}

export interface TorznabCategory {
  id: number;
  name: string;
  subcategories: Array<{ id: number; name: string }>;
}

export interface TorznabCaps {
  serverTitle: string;
  limits: { max: number; default: number };
  searchModes: TorznabSearchMode[];
  categories: TorznabCategory[];
}
