/**
 * Trakt client tests against the in-process stand-in
 */

import { after, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { RetryConfig } from '@mediabridge/plugin-utils';
import { TraktClient, toWatchlistEntries } from '../src/client.js';
import {
  ISSUED_ACCESS_TOKEN,
  TEST_CLIENT_ID,
  TEST_CLIENT_SECRET,
  TEST_CODE,
  startFakeTrakt,
  type FakeTrakt,
} from './fake-trakt.js';

const FAST_RETRY: RetryConfig = { maxRetries: 1, baseDelay: 1, maxDelay: 2, backoffMultiplier: 2 };

let trakt: FakeTrakt;

before(async () => {
  trakt = await startFakeTrakt();
});

after(async () => {
  await trakt.close();
});

beforeEach(() => {
  trakt.reset();
});

function client(clientId = TEST_CLIENT_ID): TraktClient {
  return new TraktClient({
    clientId,
    clientSecret: TEST_CLIENT_SECRET,
    baseUrl: trakt.baseUrl,
    retryConfig: FAST_RETRY,
  });
}

describe('OAuth grants', () => {
  it('exchanges an authorization code with the out-of-band redirect', async () => {
    const result = await client().exchangeCode(TEST_CODE);

    assert.ok(result.ok);
    assert.equal(result.value.access_token, 'access-1');
    assert.equal(result.value.refresh_token, 'refresh-1');
    assert.equal(result.value.expires_in, 7776000);
    assert.deepEqual(trakt.tokenRequests, [{
      code: TEST_CODE,
      client_id: TEST_CLIENT_ID,
      client_secret: TEST_CLIENT_SECRET,
      redirect_uri: 'urn:ietf:wg:oauth:2.0:oob',
      grant_type: 'authorization_code',
    }]);
  });

  it('sends a rejected refresh exactly once', async () => {
    const result = await client().refreshToken('revoked');

    assert.ok(!result.ok);
    assert.equal(result.error.kind, 'upstream_unavailable');
    assert.equal(result.error.status, 401);
    assert.equal(result.error.message, 'POST /oauth/token failed: HTTP 401');
    assert.equal(trakt.tokenRequests.length, 1);
    assert.equal(trakt.tokenRequests[0].grant_type, 'refresh_token');
  });
});

describe('lists', () => {
  it('maps watchlist movies to entries', async () => {
    const result = await client().getWatchlist(ISSUED_ACCESS_TOKEN, 'movies');

    assert.ok(result.ok);
    assert.deepEqual(result.value, [
      { type: 'movie', title: 'Dune', year: 2021, tmdbId: 438631, imdbId: 'tt1160419', source: 'watchlist' },
      { type: 'movie', title: 'Arrival', year: 2016, tmdbId: 329865, imdbId: 'tt2543164', source: 'watchlist' },
      { type: 'movie', title: 'Obscure Short', year: 2001, tmdbId: null, imdbId: '', source: 'watchlist' },
    ]);
    assert.equal(trakt.requests[0].url, '/sync/watchlist/movies');
    assert.equal(trakt.requests[0].authorization, 'Bearer access-1');
  });

  it('maps watchlist shows to tv entries', async () => {
    const result = await client().getWatchlist(ISSUED_ACCESS_TOKEN, 'shows');

    assert.ok(result.ok);
    assert.deepEqual(result.value.map(entry => [entry.type, entry.title, entry.tmdbId]), [
      ['tv', 'Severance', 95396],
      ['tv', 'Dark', 70523],
    ]);
  });

  it('keeps only movies and shows from a custom list', async () => {
    const result = await client().getListItems(ISSUED_ACCESS_TOKEN, 'alice', 'sci-fi');

    assert.ok(result.ok);
    assert.deepEqual(result.value.map(entry => entry.title), ['Dune', 'Interstellar']);
    assert.deepEqual(result.value.map(entry => entry.source), ['alice/sci-fi', 'alice/sci-fi']);
  });

  it('reports an expired access token without retrying', async () => {
    const result = await client().getWatchlist('expired-token', 'movies');

    assert.ok(!result.ok);
    assert.equal(result.error.status, 401);
    assert.equal(trakt.requests.length, 1);
  });

  it('sends the API key on every request', async () => {
    const result = await client('other-client').getWatchlist(ISSUED_ACCESS_TOKEN, 'movies');

    assert.ok(!result.ok);
    assert.equal(result.error.status, 403);
  });

  it('resolves the username behind a token', async () => {
    assert.deepEqual(await client().getUsername(ISSUED_ACCESS_TOKEN), { ok: true, value: 'alice' });
  });
});

describe('toWatchlistEntries', () => {
  it('rejects a body that is not a list', () => {
    const result = toWatchlistEntries({ error: 'nope' }, 'watchlist');
    assert.ok(!result.ok);
    assert.equal(result.error.kind, 'malformed_response');
    assert.equal(result.error.message, 'watchlist is not a list');
  });

  it('skips malformed items', () => {
    const result = toWatchlistEntries([
      { type: 'movie', movie: { title: 'Heat', year: 1995, ids: { tmdb: 949 } } },
      { movie: { title: 'No type' } },
      'garbage',
    ], 'watchlist');

    assert.deepEqual(result, {
      ok: true,
      value: [{ type: 'movie', title: 'Heat', year: 1995, tmdbId: 949, imdbId: '', source: 'watchlist' }],
    });
  });
});
