/**
 * Trakt Sync Plugin Tests
 */

import { after, before, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  MemorySiteRegistry,
  ONE_DAY_MS,
  createMemoryStorage,
  type PluginContext,
  type RetryConfig,
  type StoredSettings,
} from '@mediabridge/plugin-utils';
import { TraktSyncPlugin, traktSettingsSchema } from '../src/plugin.js';
import { createServer } from '../src/server.js';
import type { SyncResult } from '../src/types.js';
import { FakeMediaHost } from './fake-host.js';
import {
  ISSUED_ACCESS_TOKEN,
  TEST_CLIENT_ID,
  TEST_CLIENT_SECRET,
  TEST_CODE,
  VALID_REFRESH_TOKEN,
  startFakeTrakt,
  type FakeTrakt,
} from './fake-trakt.js';

const FAST_RETRY: RetryConfig = { maxRetries: 1, baseDelay: 1, maxDelay: 2, backoffMultiplier: 2 };
const NOW = new Date('2025-01-01T00:00:00.000Z');

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

/** Dune and Severance are new, Arrival is in the library, Dark is subscribed */
function typicalHost(): FakeMediaHost {
  const host = new FakeMediaHost()
    .learn('movie', 'Dune', 2021, 438631)
    .learn('movie', 'Arrival', 2016, 329865)
    .learn('tv', 'Severance', 2022, 95396)
    .learn('tv', 'Dark', 2017, 70523);
  host.library.add(329865);
  host.subscribed.add(70523);
  return host;
}

const AUTHORIZED = {
  enabled: true,
  clientId: TEST_CLIENT_ID,
  clientSecret: TEST_CLIENT_SECRET,
  refreshToken: VALID_REFRESH_TOKEN,
  accessToken: ISSUED_ACCESS_TOKEN,
  tokenExpiresAt: '2025-06-01T00:00:00.000Z',
};

async function startPlugin(overrides: Record<string, unknown> = {}, host = typicalHost()) {
  const saved: StoredSettings[] = [];
  const ctx: PluginContext = {
    registry: new MemorySiteRegistry(),
    saveSettings: async (patch) => {
      saved.push(patch);
    },
  };
  const plugin = new TraktSyncPlugin({
    collaborators: host.collaborators(),
    apiUrl: trakt.baseUrl,
    retryConfig: FAST_RETRY,
    now: () => NOW,
  });
  await plugin.init(traktSettingsSchema.parse({ ...AUTHORIZED, ...overrides }), ctx);
  return { plugin, host, saved };
}

function route(plugin: TraktSyncPlugin, method: 'GET' | 'POST', path: string) {
  const found = plugin.getApi().find(candidate => candidate.method === method && candidate.path === path);
  assert.ok(found, `${method} ${path} should exist`);
  return found;
}

describe('sync', () => {
  it('needs client credentials', async () => {
    const { plugin } = await startPlugin({ clientId: '', clientSecret: '' });

    const result = await plugin.sync();

    assert.equal(result.success, false);
    assert.deepEqual(result.errors, ['Trakt client id and secret are required']);
    assert.deepEqual(trakt.requests, []);
  });

  it('needs a refresh token', async () => {
    const { plugin } = await startPlugin({ refreshToken: '' });
    assert.deepEqual((await plugin.sync()).errors, ['No refresh token; authorize the plugin first']);
  });

  it('does nothing while disabled', async () => {
    const { plugin } = await startPlugin({ enabled: false });

    assert.deepEqual((await plugin.sync()).errors, ['Trakt sync is not enabled']);
    assert.deepEqual(plugin.getServices(), []);
    assert.equal(plugin.getState(), false);
  });

  it('runs once while disabled when asked to run once', async () => {
    const { plugin, host } = await startPlugin({ enabled: false, onlyonce: true });

    const result = await plugin.sync();

    assert.equal(result.success, true);
    assert.equal(host.subscribeCalls.length, 2);
    assert.deepEqual(plugin.getServices(), []);
    assert.equal(plugin.getState(), false);
  });

  it('records the last successful sync', async () => {
    const { plugin, host } = await startPlugin();

    const result = await plugin.sync();

    assert.equal(result.success, true);
    assert.equal(host.subscribeCalls.length, 2);
    const last = plugin.getLastSync();
    assert.equal(last.result, result);
    assert.ok(last.at instanceof Date);
  });

  it('persists a refreshed token through the host', async () => {
    const { plugin, saved } = await startPlugin({ tokenExpiresAt: '2025-01-03T00:00:00.000Z' });

    await plugin.sync();

    assert.deepEqual(saved, [{
      accessToken: 'access-2',
      refreshToken: 'refresh-2',
      tokenExpiresAt: '2025-04-01T00:00:00.000Z',
    }]);
    assert.equal(plugin.getSettings().refreshToken, 'refresh-2');
  });

  it('keeps syncing when the refreshed token cannot be saved', async () => {
    const plugin = new TraktSyncPlugin({
      collaborators: typicalHost().collaborators(),
      apiUrl: trakt.baseUrl,
      retryConfig: FAST_RETRY,
      now: () => NOW,
    });
    const ctx: PluginContext = {
      registry: new MemorySiteRegistry(),
      saveSettings: async () => {
        throw new Error('settings store unavailable');
      },
    };
    await plugin.init(traktSettingsSchema.parse({ ...AUTHORIZED, tokenExpiresAt: '2025-01-03T00:00:00.000Z' }), ctx);

    const result = await plugin.sync();

    assert.equal(result.success, true);
    assert.equal(plugin.getSettings().refreshToken, 'refresh-2');
  });
});

describe('services', () => {
  it('syncs once a day without a cron expression', async () => {
    const { plugin } = await startPlugin();
    const [service] = plugin.getServices();

    assert.equal(service.id, 'watchlist-sync');
    assert.deepEqual(service.trigger, { type: 'interval', everyMs: ONE_DAY_MS });
  });

  it('follows the configured cron expression', async () => {
    const { plugin } = await startPlugin({ cron: '0 8 * * *' });
    assert.deepEqual(plugin.getServices()[0].trigger, { type: 'cron', expression: '0 8 * * *' });
  });
});

describe('commands', () => {
  it('registers the sync and download commands', async () => {
    const { plugin } = await startPlugin();
    assert.deepEqual(plugin.getCommands().map(command => [command.cmd, command.action]), [
      ['/trakt_sync', 'trakt_sync'],
      ['/trakt_download', 'trakt_download'],
    ]);
  });

  it('replies with the sync counters', async () => {
    const { plugin } = await startPlugin();

    assert.equal(await plugin.onCommand('trakt_sync'), [
      'Trakt watchlist sync finished',
      'Movies added: 1, existing: 1',
      'Shows added: 1, existing: 1',
      'Skipped: 1, errors: 0',
    ].join('\n'));
  });

  it('downloads on the download command', async () => {
    const { plugin, host } = await startPlugin();

    await plugin.onCommand('trakt_download');

    assert.deepEqual(host.downloadCalls, [438631, 95396]);
  });

  it('reports why a sync could not run', async () => {
    const { plugin } = await startPlugin({ refreshToken: '' });
    assert.equal(await plugin.onCommand('trakt_sync'), 'Trakt watchlist sync failed: No refresh token; authorize the plugin first');
  });

  it('ignores actions of other plugins', async () => {
    const { plugin } = await startPlugin();
    assert.equal(await plugin.onCommand('jackett_sync'), null);
  });
});

describe('plugin API', () => {
  it('exchanges an authorization code and stores the tokens', async () => {
    const { plugin, saved } = await startPlugin({ accessToken: '', refreshToken: '', tokenExpiresAt: '' });

    const reply = await route(plugin, 'POST', '/oauth/exchange').handler({ query: {}, body: { code: TEST_CODE } });

    assert.deepEqual(reply, { success: true, expiresAt: '2025-04-01T00:00:00.000Z' });
    assert.deepEqual(saved, [{
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      tokenExpiresAt: '2025-04-01T00:00:00.000Z',
    }]);
  });

  it('reports a rejected or missing code', async () => {
    const { plugin } = await startPlugin();
    const exchange = route(plugin, 'POST', '/oauth/exchange');

    assert.deepEqual(await exchange.handler({ query: {}, body: { code: 'expired-code' } }), {
      success: false,
      error: 'Authorization failed: POST /oauth/token failed: HTTP 401',
    });
    assert.deepEqual(await exchange.handler({ query: {}, body: {} }), { success: false, error: 'code is required' });
  });

  it('reports the last sync', async () => {
    const { plugin } = await startPlugin();
    const stats = route(plugin, 'GET', '/stats');

    assert.deepEqual(await stats.handler({ query: {}, body: null }), {
      lastSyncAt: null,
      stats: null,
      tokenExpiresAt: '2025-06-01T00:00:00.000Z',
      syncing: false,
    });

    await plugin.sync();
    const latest = await stats.handler({ query: {}, body: null });
    assert.deepEqual(latest, {
      lastSyncAt: plugin.getLastSync().at?.toISOString(),
      stats: { moviesAdded: 1, showsAdded: 1, moviesExisting: 1, showsExisting: 1, skipped: 1, errors: 0 },
      tokenExpiresAt: '2025-06-01T00:00:00.000Z',
      syncing: false,
    });
  });
});

describe('HTTP API', () => {
  async function withServer(host: FakeMediaHost, fn: (baseUrl: string) => Promise<void>) {
    const server = await createServer(
      {
        port: 0,
        host: '127.0.0.1',
        clientId: TEST_CLIENT_ID,
        clientSecret: TEST_CLIENT_SECRET,
        refreshToken: VALID_REFRESH_TOKEN,
        enabled: true,
        security: {},
      },
      {
        storage: createMemoryStorage(),
        plugin: { collaborators: host.collaborators(), apiUrl: trakt.baseUrl, retryConfig: FAST_RETRY, now: () => NOW },
        onlyOnceDelayMs: 0,
      }
    );
    await server.start();
    const address = server.app.server.address();
    assert.ok(address && typeof address === 'object');
    try {
      await fn(`http://127.0.0.1:${address.port}`);
    } finally {
      await server.stop();
    }
  }

  it('GET /v1/plugins/trakt-sync reports the daily job', async () => {
    await withServer(typicalHost(), async (baseUrl) => {
      const res = await fetch(`${baseUrl}/v1/plugins/trakt-sync`);
      assert.equal(res.status, 200);
      const body = await res.json() as { enabled: boolean; jobs: Array<{ id: string }> };
      assert.equal(body.enabled, true);
      assert.deepEqual(body.jobs.map(job => job.id), ['trakt-sync:watchlist-sync']);
    });
  });

  it('POST /v1/plugins/trakt-sync/api/sync refreshes the seeded token and stores the new one', async () => {
    const host = typicalHost();
    await withServer(host, async (baseUrl) => {
      const res = await fetch(`${baseUrl}/v1/plugins/trakt-sync/api/sync?download=true`, { method: 'POST' });
      assert.equal(res.status, 200);
      const result = await res.json() as SyncResult;
      assert.equal(result.success, true);
      assert.deepEqual(result.stats, {
        moviesAdded: 1,
        showsAdded: 1,
        moviesExisting: 1,
        showsExisting: 1,
        skipped: 1,
        errors: 0,
      });
      assert.deepEqual(host.downloadCalls, [438631, 95396]);
      assert.equal(trakt.tokenRequests.length, 1);

      const config = await fetch(`${baseUrl}/v1/plugins/trakt-sync/config`);
      const stored = await config.json() as Record<string, unknown>;
      assert.equal(stored.accessToken, 'access-2');
      assert.equal(stored.refreshToken, 'refresh-2');
      assert.equal(stored.tokenExpiresAt, '2025-04-01T00:00:00.000Z');
    });
  });

  it('POST /v1/commands runs the sync command', async () => {
    await withServer(typicalHost(), async (baseUrl) => {
      const res = await fetch(`${baseUrl}/v1/commands`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ cmd: '/trakt_sync' }),
      });
      assert.equal(res.status, 200);
      const body = await res.json() as { reply: string };
      assert.equal(body.reply.split('\n')[0], 'Trakt watchlist sync finished');
    });
  });
});
