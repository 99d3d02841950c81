/**
 * Plugin contract
 * Lifecycle hooks the plugin host calls, and the base class plugins extend
 */

import { z } from 'zod';
import type { SiteRegistry } from './site-registry.js';
import type { StoredSettings } from './config-store.js';
import type { JobTrigger } from './scheduler.js';
import type { SearchRequest, SiteRecord, TorrentRecord } from './types.js';
import type { UiNode } from './ui.js';
import { createLogger, type Logger } from './logger.js';

export const baseSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  onlyonce: z.boolean().default(false),
  cron: z.string().default(''),
});

export interface BaseSettings {
  enabled: boolean;
  onlyonce: boolean;
  cron: string;
}

/** Services the host lends to a plugin while it is initialised */
export interface PluginContext {
  readonly registry: SiteRegistry;
  /** Merges `patch` into the plugin's stored settings */
  saveSettings(patch: StoredSettings): Promise<void>;
}

/**
 * Handles searches the host dispatches to sites owned by the plugin.
 * Never rejects; failures resolve to an empty list.
 */
export interface SearchProvider {
  search(site: SiteRecord, request: SearchRequest): Promise<TorrentRecord[]>;
}

export interface PluginService {
  id: string;
  name: string;
  trigger: JobTrigger;
  run(): Promise<void>;
}

export interface PluginApiRequest {
  query: Record<string, string | undefined>;
  body: unknown;
}

export interface PluginApiRoute {
  path: string;
  method: 'GET' | 'POST';
  summary: string;
  handler(request: PluginApiRequest): Promise<unknown>;
}

export interface PluginCommand {
  cmd: string;
  description: string;
  category: string;
  action: string;
}

export interface ToolParameter {
  name: string;
  type: 'string' | 'number';
  description: string;
  required: boolean;
}

/** A tool exposed to the host's chat agent; output is plain text for the user. */
export interface AgentTool {
  name: string;
  description: string;
  parameters: ToolParameter[];
  describe(input: unknown): string;
  run(input: unknown): Promise<string>;
}

export interface PluginInfo {
  readonly id: string;
  /** Prefix of every site name the plugin registers */
  readonly name: string;
  readonly version: string;
  readonly description: string;
}

export interface PluginHooks {
  getState(): boolean;
  stop(): Promise<void>;
  /** What the "run once" switch triggers */
  runNow(): Promise<void>;
  getSearchProvider(): SearchProvider | null;
  getForm(): UiNode[];
  getPage(): UiNode[] | null;
  getApi(): PluginApiRoute[];
  getServices(): PluginService[];
  getCommands(): PluginCommand[];
  /** Returns a reply for the user, or null when the action belongs to another plugin */
  onCommand(action: string): Promise<string | null>;
  getAgentTools(): AgentTool[];
}

export interface PluginModule<TSettings extends BaseSettings> extends PluginInfo, PluginHooks {
  readonly settingsSchema: z.ZodType<TSettings, z.ZodTypeDef, unknown>;
  init(settings: TSettings, ctx: PluginContext): Promise<void>;
}

export abstract class BasePlugin<TSettings extends BaseSettings> implements PluginModule<TSettings> {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly version: string;
  abstract readonly description: string;
  abstract readonly settingsSchema: z.ZodType<TSettings, z.ZodTypeDef, unknown>;

  protected readonly logger: Logger;

  constructor(loggerName: string) {
    this.logger = createLogger(loggerName);
  }

  abstract init(settings: TSettings, ctx: PluginContext): Promise<void>;
  abstract getState(): boolean;
  abstract stop(): Promise<void>;
  abstract runNow(): Promise<void>;
  abstract getForm(): UiNode[];
  abstract getServices(): PluginService[];

  defaultSettings(): TSettings {
    return this.settingsSchema.parse({});
  }

  getSearchProvider(): SearchProvider | null {
    return null;
  }

  getPage(): UiNode[] | null {
    return null;
  }

  getApi(): PluginApiRoute[] {
    return [];
  }

  getCommands(): PluginCommand[] {
    return [];
  }

  async onCommand(_action: string): Promise<string | null> {
    return null;
  }

  getAgentTools(): AgentTool[] {
    return [];
  }
}
