/**
 * Field helpers for turning upstream search results into torrent records
 */

import type { MediaType } from './types.js';

const MOVIE_CATEGORY = 2000;
const TV_CATEGORY = 5000;

/** Newznab/Torznab category ids searched for a media type */
export function categoriesForMediaType(mtype?: MediaType | null): number[] {
  if (mtype === 'movie') return [MOVIE_CATEGORY];
  if (mtype === 'tv') return [TV_CATEGORY];
  return [MOVIE_CATEGORY, TV_CATEGORY];
}

export function formatImdbId(value: unknown): string {
  if (value === null || value === undefined || value === '' || value === 0 || value === false) {
    return '';
  }
  const imdb = String(value).trim();
  if (!imdb) return '';
  return imdb.startsWith('tt') ? imdb : `tt${imdb}`;
}

/** Non-negative integer from a number or a string of digits. */
export function toCount(value: unknown, fallback = 0): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? Math.trunc(value) : fallback;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return fallback;
}

export function toFloat(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) {
    return parseFloat(value);
  }
  return fallback;
}

/** Torznab reports peers including seeders */
export function computeLeechers(peers: number, seeders: number): number {
  return Math.max(0, peers - seeders);
}

// ============================================================================
// Promotion flags
// ============================================================================

export const FLAG_FREELEECH = 1;
export const FLAG_HALFLEECH = 4;
export const FLAG_DOUBLE_UPLOAD = 8;

const FLAG_TAGS: Record<string, number> = {
  freeleech: FLAG_FREELEECH,
  halfleech: FLAG_HALFLEECH,
  doubleupload: FLAG_DOUBLE_UPLOAD,
};

export type VolumeFlags = number | string | ReadonlyArray<number | string> | null | undefined;

export interface VolumeFactors {
  download: number;
  upload: number;
}

function flagBits(flags: VolumeFlags): number {
  if (flags === null || flags === undefined) return 0;

  if (typeof flags === 'number') {
    return Number.isInteger(flags) && flags > 0 ? flags : 0;
  }

  if (typeof flags === 'string') {
    let bits = 0;
    for (const token of flags.split(/[\s,|]+/)) {
      if (/^\d+$/.test(token)) {
        bits |= parseInt(token, 10);
      } else {
        bits |= FLAG_TAGS[token.toLowerCase().replace(/[_-]/g, '')] ?? 0;
      }
    }
    return bits;
  }

  let bits = 0;
  for (const flag of flags) {
    bits |= flagBits(flag);
  }
  return bits;
}

/**
 * Maps a promotion flag to volume factors: `1`/`freeleech` costs nothing to
 * download, `4`/`halfleech` half, `8`/`doubleupload` counts uploads twice.
 * Flags may come as a bitmask, a numeric string, a tag or a list of either.
 */
export function volumeFactorsFromFlags(flags: VolumeFlags): VolumeFactors {
  const bits = flagBits(flags);

  let download = 1.0;
  if (bits & FLAG_FREELEECH) {
    download = 0.0;
  } else if (bits & FLAG_HALFLEECH) {
    download = 0.5;
  }

  return {
    download,
    upload: bits & FLAG_DOUBLE_UPLOAD ? 2.0 : 1.0,
  };
}

// ============================================================================
// Dates
// ============================================================================

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const RFC2822_PATTERN =
  /^(?:[A-Za-z]{3},\s*)?(\d{1,2})\s+([A-Za-z]{3})\s+(\d{2}|\d{4})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+(?:[+-]\d{4}|[A-Za-z]{1,5}))?\s*$/;

const ISO8601_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatParts(year: number, month: number, day: number, hour: number, minute: number, second: number): string | null {
  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // Rejects days the month does not have, such as 31 Feb
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * `Thu, 15 Jun 2023 12:34:56 +0000` becomes `2023-06-15 12:34:56`. The time
 * is kept as written, without converting the offset. Unparseable input is
 * returned unchanged.
 */
export function parseRfc2822Date(value: string): string {
  if (!value) return '';

  const match = RFC2822_PATTERN.exec(value.trim());
  if (!match) return value;

  const [, day, monthName, yearText, hour, minute, second] = match;
  const month = MONTHS[monthName.toLowerCase()];
  if (!month) return value;

  let year = parseInt(yearText, 10);
  if (yearText.length === 2) {
    year += year < 50 ? 2000 : 1900;
  }

  return formatParts(
    year,
    month,
    parseInt(day, 10),
    parseInt(hour, 10),
    parseInt(minute, 10),
    second ? parseInt(second, 10) : 0
  ) ?? value;
}

/** `2023-06-15T12:34:56Z` becomes `2023-06-15 12:34:56`; same rules as above. */
export function parseIsoDate(value: string): string {
  if (!value) return '';

  const match = ISO8601_PATTERN.exec(value.trim());
  if (!match) return value;

  const [, year, month, day, hour, minute, second] = match;
  return formatParts(
    parseInt(year, 10),
    parseInt(month, 10),
    parseInt(day, 10),
    hour ? parseInt(hour, 10) : 0,
    minute ? parseInt(minute, 10) : 0,
    second ? parseInt(second, 10) : 0
  ) ?? value;
}

// ============================================================================
// Keywords
// ============================================================================

function isCjk(codePoint: number): boolean {
  return (codePoint >= 0x4e00 && codePoint <= 0x9fff)
    || (codePoint >= 0x3040 && codePoint <= 0x309f)
    || (codePoint >= 0x30a0 && codePoint <= 0x30ff)
    || (codePoint >= 0xac00 && codePoint <= 0xd7af);
}

/**
 * Torznab indexers mostly match on English titles. A keyword counts as
 * English when, punctuation and spaces aside, CJK characters make up at most
 * 30% of it and ASCII characters more than half.
 */
export function isEnglishKeyword(keyword: string): boolean {
  if (!keyword) return false;

  const cleaned = Array.from(keyword.replace(/[.,!?;:()[\]{}\s\-_]+/g, ''));
  if (cleaned.length === 0) return true;

  let ascii = 0;
  let cjk = 0;
  for (const char of cleaned) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (codePoint < 128) ascii++;
    if (isCjk(codePoint)) cjk++;
  }

  if (cjk / cleaned.length > 0.3) {
    return false;
  }

  return ascii / cleaned.length > 0.5;
}
