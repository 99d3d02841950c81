/**
 * Torrent field helper tests
 *
 * Run: tsx --test tests/torrent-fields.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  categoriesForMediaType,
  computeLeechers,
  formatImdbId,
  isEnglishKeyword,
  parseIsoDate,
  parseRfc2822Date,
  toCount,
  toFloat,
  volumeFactorsFromFlags,
} from '../src/torrent-fields.js';

describe('categoriesForMediaType', () => {
  it('maps media types to Torznab categories', () => {
    assert.deepEqual(categoriesForMediaType('movie'), [2000]);
    assert.deepEqual(categoriesForMediaType('tv'), [5000]);
    assert.deepEqual(categoriesForMediaType(undefined), [2000, 5000]);
    assert.deepEqual(categoriesForMediaType(null), [2000, 5000]);
  });
});

describe('formatImdbId', () => {
  it('prefixes bare ids with tt', () => {
    assert.equal(formatImdbId(137523), 'tt137523');
    assert.equal(formatImdbId('0137523'), 'tt0137523');
  });

  it('leaves prefixed ids alone', () => {
    assert.equal(formatImdbId('tt0137523'), 'tt0137523');
    assert.equal(formatImdbId(formatImdbId('0137523')), 'tt0137523');
  });

  it('returns an empty string for missing ids', () => {
    assert.equal(formatImdbId(''), '');
    assert.equal(formatImdbId(0), '');
    assert.equal(formatImdbId(null), '');
    assert.equal(formatImdbId(undefined), '');
  });
});

describe('toCount / toFloat', () => {
  it('accepts non-negative integers and digit strings', () => {
    assert.equal(toCount(42), 42);
    assert.equal(toCount('42'), 42);
    assert.equal(toCount(' 7 '), 7);
    assert.equal(toCount(3.9), 3);
  });

  it('falls back for anything else', () => {
    assert.equal(toCount(-1), 0);
    assert.equal(toCount('-3'), 0);
    assert.equal(toCount('12abc', 5), 5);
    assert.equal(toCount(undefined), 0);
  });

  it('parses decimal strings', () => {
    assert.equal(toFloat('0.5', 1), 0.5);
    assert.equal(toFloat('2', 1), 2);
    assert.equal(toFloat('half', 1), 1);
  });
});

describe('computeLeechers', () => {
  it('subtracts seeders from peers and never goes negative', () => {
    assert.equal(computeLeechers(10, 4), 6);
    assert.equal(computeLeechers(3, 5), 0);
  });
});

describe('volumeFactorsFromFlags', () => {
  it('returns neutral factors without flags', () => {
    assert.deepEqual(volumeFactorsFromFlags(null), { download: 1.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags(0), { download: 1.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags([]), { download: 1.0, upload: 1.0 });
  });

  it('reads bitmasks', () => {
    assert.deepEqual(volumeFactorsFromFlags(1), { download: 0.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags(4), { download: 0.5, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags(8), { download: 1.0, upload: 2.0 });
    assert.deepEqual(volumeFactorsFromFlags('9'), { download: 0.0, upload: 2.0 });
  });

  it('prefers freeleech over halfleech', () => {
    assert.deepEqual(volumeFactorsFromFlags(5), { download: 0.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags(['halfleech', 'freeleech']), { download: 0.0, upload: 1.0 });
  });

  it('reads tags and mixed lists', () => {
    assert.deepEqual(volumeFactorsFromFlags('freeleech'), { download: 0.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags('Half-Leech'), { download: 0.5, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags(['doubleupload', 4]), { download: 0.5, upload: 2.0 });
    assert.deepEqual(volumeFactorsFromFlags('freeleech, doubleupload'), { download: 0.0, upload: 2.0 });
  });

  it('ignores partial freeleech tags', () => {
    assert.deepEqual(volumeFactorsFromFlags(['freeleech75']), { download: 1.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags('freeleech25'), { download: 1.0, upload: 1.0 });
    assert.deepEqual(volumeFactorsFromFlags('double_upload'), { download: 1.0, upload: 2.0 });
  });
});

describe('dates', () => {
  it('formats RFC 2822 dates in the written wall time', () => {
    assert.equal(parseRfc2822Date('Thu, 15 Jun 2023 12:34:56 +0000'), '2023-06-15 12:34:56');
    assert.equal(parseRfc2822Date('Thu, 15 Jun 2023 12:34:56 +0200'), '2023-06-15 12:34:56');
    assert.equal(parseRfc2822Date('15 Jun 23 08:05 GMT'), '2023-06-15 08:05:00');
  });

  it('formats ISO 8601 dates', () => {
    assert.equal(parseIsoDate('2023-06-15T12:34:56Z'), '2023-06-15 12:34:56');
    assert.equal(parseIsoDate('2023-06-15T12:34:56.789+02:00'), '2023-06-15 12:34:56');
    assert.equal(parseIsoDate('2024-01-02'), '2024-01-02 00:00:00');
  });

  it('returns unparseable input unchanged and empty input as empty', () => {
    assert.equal(parseRfc2822Date('not a date'), 'not a date');
    assert.equal(parseRfc2822Date('Thu, 15 Foo 2023 12:34:56 +0000'), 'Thu, 15 Foo 2023 12:34:56 +0000');
    assert.equal(parseIsoDate('yesterday'), 'yesterday');
    assert.equal(parseRfc2822Date(''), '');
    assert.equal(parseIsoDate(''), '');
  });

  it('returns days the month does not have unchanged', () => {
    assert.equal(parseRfc2822Date('Thu, 31 Feb 2023 12:34:56 +0000'), 'Thu, 31 Feb 2023 12:34:56 +0000');
    assert.equal(parseIsoDate('2023-02-30T12:00:00Z'), '2023-02-30T12:00:00Z');
    assert.equal(parseIsoDate('2023-04-31'), '2023-04-31');
    assert.equal(parseIsoDate('2024-02-29'), '2024-02-29 00:00:00');
  });
});

describe('isEnglishKeyword', () => {
  it('accepts mostly ASCII keywords', () => {
    assert.equal(isEnglishKeyword('The Matrix'), true);
    assert.equal(isEnglishKeyword('Amélie'), true);
    assert.equal(isEnglishKeyword('Matrix 黑客'), true);
  });

  it('rejects CJK and other non-Latin keywords', () => {
    assert.equal(isEnglishKeyword('黑客帝国'), false);
    assert.equal(isEnglishKeyword('Блеск'), false);
  });

  it('treats punctuation-only keywords as English and empty ones as not', () => {
    assert.equal(isEnglishKeyword('...'), true);
    assert.equal(isEnglishKeyword(''), false);
  });
});
