/**
 * Plugin host tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PluginHost } from '../src/host.js';
import { MemorySiteRegistry } from '../src/site-registry.js';
import { MemoryConfigStore } from '../src/config-store.js';
import { EchoPlugin, site } from './echo-plugin.js';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

async function createHost(seed: Record<string, unknown> = { enabled: true, label: 'first' }) {
  const registry = new MemorySiteRegistry();
  const configStore = new MemoryConfigStore();
  const host = new PluginHost({ registry, configStore, onlyOnceDelayMs: 0 });
  const plugin = new EchoPlugin();
  host.register(plugin);
  await host.start({ echo: seed });
  return { host, plugin, registry, configStore };
}

describe('PluginHost', () => {
  it('seeds and persists settings on first start', async () => {
    const { host, plugin, configStore } = await createHost();

    assert.equal(plugin.initCalls, 1);
    assert.deepEqual(await configStore.get('echo'), { enabled: true, label: 'first' });
    assert.deepEqual(host.getSettings('echo'), { enabled: true, onlyonce: false, cron: '', label: 'first' });

    await host.shutdown();
  });

  it('loads stored settings instead of the seed', async () => {
    const registry = new MemorySiteRegistry();
    const configStore = new MemoryConfigStore({ echo: { enabled: false, label: 'stored' } });
    const host = new PluginHost({ registry, configStore, onlyOnceDelayMs: 0 });
    const plugin = new EchoPlugin();
    host.register(plugin);

    await host.start({ echo: { enabled: true, label: 'seed' } });

    assert.equal(plugin.settings.label, 'stored');
    assert.equal(plugin.getState(), false);
    await host.shutdown();
  });

  it('rejects duplicate registrations', async () => {
    const { host } = await createHost();
    assert.throws(() => host.register(new EchoPlugin()), /already registered/);
    await host.shutdown();
  });

  it('schedules services and drops them when the plugin is disabled', async () => {
    const { host } = await createHost();

    assert.deepEqual(host.describePlugin('echo')?.jobs.map(job => job.id), ['echo:tick']);

    const result = await host.updateConfig('echo', { enabled: false });
    assert.ok(result.ok);
    assert.deepEqual(result.value, { enabled: false, label: 'first' });
    assert.deepEqual(host.describePlugin('echo')?.jobs, []);

    await host.shutdown();
  });

  it('rejects invalid settings without touching the running plugin', async () => {
    const { host, plugin } = await createHost();

    const result = await host.updateConfig('echo', { enabled: 'yes' });
    assert.ok(!result.ok);
    assert.equal(result.error.code, 'invalid_settings');
    assert.equal(plugin.initCalls, 1);
    assert.deepEqual(host.getStoredSettings('echo'), { enabled: true, label: 'first' });

    const missing = await host.updateConfig('nope', {});
    assert.ok(!missing.ok);
    assert.equal(missing.error.code, 'not_found');

    await host.shutdown();
  });

  it('runs once and persists the switch as off', async () => {
    const { host, plugin, configStore } = await createHost();

    await host.updateConfig('echo', { onlyonce: true });
    await sleep(20);

    assert.equal(plugin.runNowCalls, 1);
    assert.deepEqual(await configStore.get('echo'), { enabled: true, label: 'first', onlyonce: false });
    assert.equal(host.getSettings('echo')?.onlyonce, false);

    await host.shutdown();
  });

  it('lets plugins merge values into their stored settings', async () => {
    const { host, plugin, configStore } = await createHost();
    assert.ok(plugin.ctx);

    await plugin.ctx.saveSettings({ token: 'test-token' });

    assert.deepEqual(await configStore.get('echo'), { enabled: true, label: 'first', token: 'test-token' });
    await host.shutdown();
  });

  it('routes searches to the plugin named by the site prefix', async () => {
    const { host, registry } = await createHost();
    await registry.add('echo_indexer.alpha', site('Echo-Alpha', 'echo_indexer.alpha'));
    await registry.add('other_indexer.beta', site('Other-Beta', 'other_indexer.beta'));

    const found = await host.search('echo_indexer.alpha', { keyword: 'dune' });
    assert.ok(found.ok);
    assert.equal(found.value.pluginId, 'echo');
    assert.deepEqual(found.value.results.map(result => [result.title, result.siteName]), [['first: dune', 'Echo-Alpha']]);

    const foreign = await host.search('other_indexer.beta', { keyword: 'dune' });
    assert.ok(!foreign.ok);
    assert.equal(foreign.error.code, 'not_found');

    const unknown = await host.search('nowhere.1', { keyword: 'dune' });
    assert.ok(!unknown.ok);
    assert.equal(unknown.error.code, 'not_found');

    await host.updateConfig('echo', { enabled: false });
    const disabled = await host.search('echo_indexer.alpha', { keyword: 'dune' });
    assert.ok(!disabled.ok);
    assert.equal(disabled.error.code, 'unavailable');

    await host.shutdown();
  });

  it('dispatches commands and agent tools', async () => {
    const { host } = await createHost();

    assert.deepEqual(await host.runCommand('/echo_ping'), { ok: true, value: 'pong' });
    const unknown = await host.runCommand('/nope');
    assert.ok(!unknown.ok);
    assert.equal(unknown.error.code, 'not_found');

    assert.deepEqual(host.listTools().map(tool => [tool.name, tool.pluginId]), [['echo_say', 'echo']]);
    assert.deepEqual(await host.runTool('echo_say', { text: 'hi' }), { ok: true, value: 'hi' });

    await host.shutdown();
  });

  it('stops every plugin on shutdown', async () => {
    const { host, plugin } = await createHost();
    await host.shutdown();
    assert.equal(plugin.stopCalls, 1);
    assert.deepEqual(host.scheduler.list(), []);
  });
});
