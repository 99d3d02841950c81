/**
 * Token lifecycle tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { err, ok, pluginError, type Result } from '@mediabridge/plugin-utils';
import type { TokenGrants } from '../src/client.js';
import { TokenManager } from '../src/oauth.js';
import type { TokenState, TraktToken } from '../src/types.js';

const NOW = new Date('2025-01-01T00:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

class StubGrants implements TokenGrants {
  readonly refreshCalls: string[] = [];
  readonly exchangeCalls: string[] = [];

  constructor(private readonly response: Result<TraktToken>) {}

  async exchangeCode(code: string): Promise<Result<TraktToken>> {
    this.exchangeCalls.push(code);
    return this.response;
  }

  async refreshToken(refreshToken: string): Promise<Result<TraktToken>> {
    this.refreshCalls.push(refreshToken);
    return this.response;
  }
}

const FRESH_TOKEN = ok({ access_token: 'access-new', refresh_token: 'refresh-new', expires_in: 7776000 });

function managerFor(grants: TokenGrants, initial: Partial<TokenState>) {
  const persisted: TokenState[] = [];
  const manager = new TokenManager({
    grants,
    initial: { accessToken: 'access-old', refreshToken: 'refresh-old', expiresAt: null, ...initial },
    persist: async (state) => {
      persisted.push(state);
    },
    now: () => NOW,
  });
  return { manager, persisted };
}

describe('TokenManager.ensureFresh', () => {
  it('uses the current token while expiry is more than seven days away', async () => {
    const grants = new StubGrants(FRESH_TOKEN);
    const { manager, persisted } = managerFor(grants, { expiresAt: new Date(NOW.getTime() + 8 * DAY_MS) });

    assert.deepEqual(await manager.ensureFresh(), { ok: true, value: 'access-old' });
    assert.deepEqual(grants.refreshCalls, []);
    assert.deepEqual(persisted, []);
  });

  it('refreshes once when expiry is within seven days', async () => {
    const grants = new StubGrants(FRESH_TOKEN);
    const { manager, persisted } = managerFor(grants, { expiresAt: new Date(NOW.getTime() + 6 * DAY_MS) });

    assert.deepEqual(await manager.ensureFresh(), { ok: true, value: 'access-new' });
    assert.deepEqual(grants.refreshCalls, ['refresh-old']);

    const expected: TokenState = {
      accessToken: 'access-new',
      refreshToken: 'refresh-new',
      expiresAt: new Date('2025-04-01T00:00:00.000Z'),
    };
    assert.deepEqual(manager.getState(), expected);
    assert.deepEqual(persisted, [expected]);
    assert.equal(manager.isValid(), true);
  });

  it('keeps the refreshed token when saving it fails', async () => {
    const grants = new StubGrants(FRESH_TOKEN);
    const manager = new TokenManager({
      grants,
      initial: { accessToken: 'access-old', refreshToken: 'refresh-old', expiresAt: null },
      persist: async () => {
        throw new Error('settings store unavailable');
      },
      now: () => NOW,
    });

    assert.deepEqual(await manager.ensureFresh(), { ok: true, value: 'access-new' });
    assert.equal(manager.getState().accessToken, 'access-new');
    assert.equal(manager.getState().refreshToken, 'refresh-new');
    assert.deepEqual(grants.refreshCalls, ['refresh-old']);
  });

  it('refreshes at exactly seven days and when no expiry is known', async () => {
    const atThreshold = new StubGrants(FRESH_TOKEN);
    await managerFor(atThreshold, { expiresAt: new Date(NOW.getTime() + 7 * DAY_MS) }).manager.ensureFresh();
    assert.equal(atThreshold.refreshCalls.length, 1);

    const unknown = new StubGrants(FRESH_TOKEN);
    await managerFor(unknown, { expiresAt: null }).manager.ensureFresh();
    assert.equal(unknown.refreshCalls.length, 1);
  });

  it('keeps the previous token when the refresh fails', async () => {
    const grants = new StubGrants(err(pluginError('upstream_unavailable', 'POST /oauth/token failed: HTTP 401', 401)));
    const expiresAt = new Date(NOW.getTime() - DAY_MS);
    const { manager, persisted } = managerFor(grants, { expiresAt });

    const result = await manager.ensureFresh();

    assert.ok(!result.ok);
    assert.equal(result.error.status, 401);
    assert.deepEqual(grants.refreshCalls, ['refresh-old']);
    assert.deepEqual(manager.getState(), { accessToken: 'access-old', refreshToken: 'refresh-old', expiresAt });
    assert.deepEqual(persisted, []);
  });

  it('assumes a one day lifetime and keeps the refresh token when the response omits them', async () => {
    const grants = new StubGrants(ok({ access_token: 'access-new' }));
    const { manager } = managerFor(grants, {});

    await manager.ensureFresh();

    assert.deepEqual(manager.getState(), {
      accessToken: 'access-new',
      refreshToken: 'refresh-old',
      expiresAt: new Date('2025-01-02T00:00:00.000Z'),
    });
    // A day is inside the refresh threshold
    assert.equal(manager.isValid(), false);
  });

  it('fails without a call when there is no refresh token', async () => {
    const grants = new StubGrants(FRESH_TOKEN);
    const { manager } = managerFor(grants, { refreshToken: '' });

    const result = await manager.ensureFresh();

    assert.ok(!result.ok);
    assert.equal(result.error.message, 'No refresh token configured');
    assert.deepEqual(grants.refreshCalls, []);
  });
});

describe('TokenManager.exchangeCode', () => {
  it('stores the issued pair', async () => {
    const grants = new StubGrants(FRESH_TOKEN);
    const { manager, persisted } = managerFor(grants, { accessToken: '', refreshToken: '' });

    const result = await manager.exchangeCode('  test-code  ');

    assert.deepEqual(grants.exchangeCalls, ['test-code']);
    assert.deepEqual(result, {
      ok: true,
      value: { accessToken: 'access-new', refreshToken: 'refresh-new', expiresAt: new Date('2025-04-01T00:00:00.000Z') },
    });
    assert.equal(persisted.length, 1);
  });

  it('leaves the state alone when the code is rejected', async () => {
    const grants = new StubGrants(err(pluginError('upstream_unavailable', 'POST /oauth/token failed: HTTP 401', 401)));
    const { manager, persisted } = managerFor(grants, {});

    const result = await manager.exchangeCode('expired-code');

    assert.ok(!result.ok);
    assert.equal(manager.getState().accessToken, 'access-old');
    assert.deepEqual(persisted, []);
  });
});
