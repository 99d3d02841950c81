/**
 * Plugin host
 *
 * Owns the registered plugins together with their stored settings and
 * scheduled services, and routes searches for a site to the plugin whose
 * name prefixes the site's name.
 */

import type { ConfigStore, StoredSettings } from './config-store.js';
import type { SiteRegistry } from './site-registry.js';
import { JobScheduler, type ScheduledJobInfo } from './scheduler.js';
import type {
  AgentTool,
  BaseSettings,
  PluginApiRoute,
  PluginCommand,
  PluginContext,
  PluginHooks,
  PluginInfo,
  PluginModule,
} from './plugin.js';
import { siteOwner } from './indexer-address.js';
import { describeError, err, ok, type Result } from './result.js';
import { formatZodError } from './validation.js';
import { createLogger } from './logger.js';
import type { SearchRequest, SiteRecord, TorrentRecord } from './types.js';

const logger = createLogger('host');

export type HostErrorCode = 'not_found' | 'invalid_settings' | 'unavailable';

export interface HostError {
  code: HostErrorCode;
  message: string;
}

export interface PluginSummary {
  id: string;
  name: string;
  version: string;
  description: string;
  enabled: boolean;
  jobs: ScheduledJobInfo[];
}

export interface SearchOutcome {
  site: SiteRecord;
  pluginId: string;
  results: TorrentRecord[];
}

export interface PluginHostOptions {
  registry: SiteRegistry;
  configStore: ConfigStore;
  scheduler?: JobScheduler;
  /** Delay before the "run once" switch fires */
  onlyOnceDelayMs?: number;
}

interface PluginEntry {
  plugin: PluginInfo & PluginHooks;
  stored: StoredSettings;
  settings: BaseSettings | null;
  configure(raw: StoredSettings): Promise<Result<BaseSettings, string>>;
}

function hostError(code: HostErrorCode, message: string): HostError {
  return { code, message };
}

export class PluginHost {
  readonly registry: SiteRegistry;
  readonly configStore: ConfigStore;
  readonly scheduler: JobScheduler;
  private readonly onlyOnceDelayMs: number;
  private plugins = new Map<string, PluginEntry>();

  constructor(options: PluginHostOptions) {
    this.registry = options.registry;
    this.configStore = options.configStore;
    this.scheduler = options.scheduler ?? new JobScheduler();
    this.onlyOnceDelayMs = options.onlyOnceDelayMs ?? 3000;
  }

  register<TSettings extends BaseSettings>(plugin: PluginModule<TSettings>): void {
    if (this.plugins.has(plugin.id)) {
      throw new Error(`Plugin ${plugin.id} is already registered`);
    }

    const entry: PluginEntry = {
      plugin,
      stored: {},
      settings: null,
      configure: async (raw) => {
        const parsed = plugin.settingsSchema.safeParse(raw);
        if (!parsed.success) {
          return err(formatZodError(parsed.error));
        }
        const settings = parsed.data;
        await this.activate(entry, raw, settings, ctx => plugin.init(settings, ctx));
        return ok(settings);
      },
    };

    this.plugins.set(plugin.id, entry);
    logger.debug('Plugin registered', { id: plugin.id, version: plugin.version });
  }

  /**
   * Initialises every plugin from its stored settings. Plugins without stored
   * settings start from `seed` (or their defaults) and have it persisted.
   */
  async start(seed: Record<string, StoredSettings> = {}): Promise<void> {
    for (const [id, entry] of this.plugins) {
      let stored = await this.configStore.get(id);
      if (!stored) {
        stored = { ...seed[id] };
        await this.configStore.save(id, stored);
      }

      const result = await entry.configure(stored);
      if (!result.ok) {
        logger.error('Stored settings are invalid, plugin not started', { id, error: result.error });
      }
    }
  }

  private contextFor(entry: PluginEntry): PluginContext {
    return {
      registry: this.registry,
      saveSettings: async (patch) => {
        entry.stored = { ...entry.stored, ...patch };
        await this.configStore.save(entry.plugin.id, entry.stored);
      },
    };
  }

  private async activate(
    entry: PluginEntry,
    raw: StoredSettings,
    settings: BaseSettings,
    init: (ctx: PluginContext) => Promise<void>
  ): Promise<void> {
    const { id } = entry.plugin;
    const ctx = this.contextFor(entry);

    this.scheduler.cancel(id);
    entry.stored = { ...raw };
    entry.settings = settings;
    await this.configStore.save(id, entry.stored);

    try {
      await init(ctx);
    } catch (error) {
      logger.error('Plugin initialisation failed', {
        id,
        error: describeError(error),
      });
      return;
    }

    for (const service of entry.plugin.getServices()) {
      this.scheduler.schedule(`${id}:${service.id}`, service.name, service.trigger, () => service.run());
    }

    if (settings.onlyonce) {
      entry.settings = { ...settings, onlyonce: false };
      await ctx.saveSettings({ onlyonce: false });
      logger.info('Running once', { id, delayMs: this.onlyOnceDelayMs });
      this.scheduler.runOnce(`${id}:run-once`, this.onlyOnceDelayMs, () => entry.plugin.runNow());
    }
  }

  async updateConfig(id: string, patch: StoredSettings): Promise<Result<StoredSettings, HostError>> {
    const entry = this.plugins.get(id);
    if (!entry) {
      return err(hostError('not_found', `Plugin ${id} not found`));
    }

    const result = await entry.configure({ ...entry.stored, ...patch });
    if (!result.ok) {
      return err(hostError('invalid_settings', result.error));
    }

    logger.info('Settings updated', { id });
    return ok({ ...entry.stored });
  }

  getPlugin(id: string): (PluginInfo & PluginHooks) | undefined {
    return this.plugins.get(id)?.plugin;
  }

  getStoredSettings(id: string): StoredSettings | null {
    const entry = this.plugins.get(id);
    return entry ? { ...entry.stored } : null;
  }

  getSettings(id: string): BaseSettings | null {
    return this.plugins.get(id)?.settings ?? null;
  }

  private summarize(entry: PluginEntry): PluginSummary {
    const { id, name, version, description } = entry.plugin;
    return {
      id,
      name,
      version,
      description,
      enabled: entry.plugin.getState(),
      jobs: this.scheduler.list().filter(job => job.id.startsWith(`${id}:`)),
    };
  }

  listPlugins(): PluginSummary[] {
    return Array.from(this.plugins.values(), entry => this.summarize(entry));
  }

  describePlugin(id: string): PluginSummary | null {
    const entry = this.plugins.get(id);
    return entry ? this.summarize(entry) : null;
  }

  async listSites(): Promise<SiteRecord[]> {
    return this.registry.list();
  }

  /** The plugin that registered a site, found by the site's name prefix */
  ownerOf(site: SiteRecord): (PluginInfo & PluginHooks) | undefined {
    const owner = siteOwner(site.name);
    for (const entry of this.plugins.values()) {
      if (entry.plugin.name === owner) {
        return entry.plugin;
      }
    }
    return undefined;
  }

  async search(domain: string, request: SearchRequest): Promise<Result<SearchOutcome, HostError>> {
    const site = await this.registry.get(domain);
    if (!site) {
      return err(hostError('not_found', `Site ${domain} not found`));
    }

    const owner = this.ownerOf(site);
    if (!owner) {
      return err(hostError('not_found', `No plugin handles site ${site.name}`));
    }

    const provider = owner.getSearchProvider();
    if (!provider) {
      return err(hostError('unavailable', `Plugin ${owner.id} is not enabled`));
    }

    const results = await provider.search(site, request);
    return ok({ site, pluginId: owner.id, results });
  }

  findApiRoute(id: string, method: string, path: string): PluginApiRoute | undefined {
    const plugin = this.getPlugin(id);
    return plugin?.getApi().find(route => route.method === method && route.path === path);
  }

  listCommands(): Array<PluginCommand & { pluginId: string }> {
    return Array.from(this.plugins.values()).flatMap(({ plugin }) =>
      plugin.getCommands().map(command => ({ ...command, pluginId: plugin.id }))
    );
  }

  async runCommand(cmd: string): Promise<Result<string, HostError>> {
    const command = this.listCommands().find(candidate => candidate.cmd === cmd);
    if (!command) {
      return err(hostError('not_found', `Unknown command ${cmd}`));
    }

    const plugin = this.getPlugin(command.pluginId);
    const reply = plugin ? await plugin.onCommand(command.action) : null;
    if (reply === null) {
      return err(hostError('unavailable', `Command ${cmd} was not handled`));
    }
    return ok(reply);
  }

  listTools(): Array<AgentTool & { pluginId: string }> {
    return Array.from(this.plugins.values()).flatMap(({ plugin }) =>
      plugin.getAgentTools().map(tool => ({ ...tool, pluginId: plugin.id }))
    );
  }

  async runTool(name: string, input: unknown): Promise<Result<string, HostError>> {
    const tool = this.listTools().find(candidate => candidate.name === name);
    if (!tool) {
      return err(hostError('not_found', `Unknown tool ${name}`));
    }
    return ok(await tool.run(input));
  }

  async shutdown(): Promise<void> {
    this.scheduler.stopAll();
    for (const { plugin } of this.plugins.values()) {
      try {
        await plugin.stop();
      } catch (error) {
        logger.error('Plugin failed to stop', {
          id: plugin.id,
          error: describeError(error),
        });
      }
    }
  }
}
