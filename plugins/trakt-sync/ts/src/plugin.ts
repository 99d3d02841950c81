/**
 * Trakt Sync Plugin
 * Keeps host subscriptions in step with a Trakt watchlist and custom lists
 */

import { z } from 'zod';
import {
  BasePlugin,
  ONE_DAY_MS,
  alert,
  baseSettingsSchema,
  col,
  form,
  formatDateTime,
  parseCsvList,
  row,
  switchField,
  table,
  textField,
  type PluginApiRoute,
  type PluginCommand,
  type PluginContext,
  type PluginService,
  type RetryConfig,
  type UiNode,
} from '@mediabridge/plugin-utils';
import { TraktClient } from './client.js';
import { TokenManager } from './oauth.js';
import { TraktSyncService, emptyStats, parseCustomLists } from './sync.js';
import type { SyncCollaborators } from './collaborators.js';
import type { SyncResult, TokenState } from './types.js';

export const TRAKT_PLUGIN_ID = 'trakt-sync';

export const TRAKT_COMMANDS = {
  sync: 'trakt_sync',
  download: 'trakt_download',
} as const;

export const traktSettingsSchema = baseSettingsSchema.extend({
  notify: z.boolean().default(true),
  clientId: z.string().trim().default(''),
  clientSecret: z.string().trim().default(''),
  refreshToken: z.string().trim().default(''),
  accessToken: z.string().trim().default(''),
  /** ISO timestamp */
  tokenExpiresAt: z.string().default(''),
  autoDownload: z.boolean().default(false),
  /** Comma separated `user/listId` pairs */
  customLists: z.string().default(''),
  proxy: z.boolean().default(false),
});

export type TraktSettings = z.infer<typeof traktSettingsSchema>;

const exchangeBodySchema = z.object({
  code: z.string().trim().min(1),
});

export interface TraktPluginOptions {
  collaborators: SyncCollaborators;
  /** Trakt API base URL */
  apiUrl?: string;
  retryConfig?: RetryConfig;
  now?: () => Date;
}

interface TraktState {
  settings: TraktSettings;
  lastSync: SyncResult | null;
  lastSyncAt: Date | null;
}

function parseExpiry(value: string): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function formatStats(result: SyncResult): string {
  const { stats } = result;
  return [
    `Movies added: ${stats.moviesAdded}, existing: ${stats.moviesExisting}`,
    `Shows added: ${stats.showsAdded}, existing: ${stats.showsExisting}`,
    `Skipped: ${stats.skipped}, errors: ${stats.errors}`,
  ].join('\n');
}

export class TraktSyncPlugin extends BasePlugin<TraktSettings> {
  readonly id = TRAKT_PLUGIN_ID;
  readonly name = 'TraktSync';
  readonly version = '1.0.0';
  readonly description = 'Subscribe to or download everything on your Trakt watchlist';
  readonly settingsSchema = traktSettingsSchema;

  private readonly options: TraktPluginOptions;
  private state: TraktState = {
    settings: traktSettingsSchema.parse({}),
    lastSync: null,
    lastSyncAt: null,
  };
  private tokens: TokenManager | null = null;
  private service: TraktSyncService | null = null;

  constructor(options: TraktPluginOptions) {
    super('trakt-sync');
    this.options = options;
  }

  async init(settings: TraktSettings, ctx: PluginContext): Promise<void> {
    await this.stop();
    this.state = { ...this.state, settings };

    // A disabled plugin still builds its client when asked to run once
    if (!settings.enabled && !settings.onlyonce) {
      this.logger.info('Plugin disabled');
      return;
    }

    const client = new TraktClient({
      clientId: settings.clientId,
      clientSecret: settings.clientSecret,
      baseUrl: this.options.apiUrl,
      proxy: settings.proxy,
      retryConfig: this.options.retryConfig,
    });

    this.tokens = new TokenManager({
      grants: client,
      initial: {
        accessToken: settings.accessToken,
        refreshToken: settings.refreshToken,
        expiresAt: parseExpiry(settings.tokenExpiresAt),
      },
      persist: async (tokens: TokenState) => {
        const patch = {
          accessToken: tokens.accessToken,
          refreshToken: tokens.refreshToken,
          tokenExpiresAt: tokens.expiresAt ? tokens.expiresAt.toISOString() : '',
        };
        this.state = { ...this.state, settings: { ...this.state.settings, ...patch } };
        await ctx.saveSettings(patch);
      },
      now: this.options.now,
    });

    this.service = new TraktSyncService({
      client,
      tokens: this.tokens,
      collaborators: this.options.collaborators,
      customLists: parseCustomLists(parseCsvList(settings.customLists)),
      autoDownload: settings.autoDownload,
      notify: settings.notify,
    });

    this.logger.info('Plugin initialized', { autoDownload: settings.autoDownload, cron: settings.cron || 'daily' });
  }

  getState(): boolean {
    return this.state.settings.enabled;
  }

  getSettings(): TraktSettings {
    return this.state.settings;
  }

  getLastSync(): { result: SyncResult | null; at: Date | null } {
    return { result: this.state.lastSync, at: this.state.lastSyncAt };
  }

  private missingCredentials(): string | null {
    const { clientId, clientSecret, refreshToken } = this.state.settings;
    if (!clientId || !clientSecret) return 'Trakt client id and secret are required';
    if (!refreshToken) return 'No refresh token; authorize the plugin first';
    return null;
  }

  /** Runs a sync; `download` forces search and download on for this run. */
  async sync(download?: boolean): Promise<SyncResult> {
    const missing = this.missingCredentials();
    if (!this.service || missing) {
      const error = missing ?? 'Trakt sync is not enabled';
      this.logger.error('Sync not possible', { error });
      return {
        success: false,
        stats: emptyStats(),
        errors: [error],
        duration: 0,
      };
    }

    const result = await this.service.sync({ download });
    if (result.success) {
      this.state = { ...this.state, lastSync: result, lastSyncAt: new Date() };
    }
    return result;
  }

  async runNow(): Promise<void> {
    await this.sync();
  }

  /** Completes the authorization code flow and stores the tokens */
  async authorize(code: string): Promise<TokenState> {
    if (!this.tokens) {
      throw new Error('Trakt sync is not enabled');
    }
    const result = await this.tokens.exchangeCode(code);
    if (!result.ok) {
      throw new Error(`Authorization failed: ${result.error.message}`);
    }
    return result.value;
  }

  async stop(): Promise<void> {
    if (this.service?.isSyncing()) {
      this.logger.warn('Stopping while a sync is running; it finishes in the background');
    }
    this.service = null;
    this.tokens = null;
  }

  getServices(): PluginService[] {
    const { enabled, cron } = this.state.settings;
    if (!enabled) {
      return [];
    }

    return [{
      id: 'watchlist-sync',
      name: 'Trakt watchlist sync',
      trigger: cron ? { type: 'cron', expression: cron } : { type: 'interval', everyMs: ONE_DAY_MS },
      run: async () => {
        await this.sync();
      },
    }];
  }

  getCommands(): PluginCommand[] {
    return [
      {
        cmd: '/trakt_sync',
        description: 'Sync the Trakt watchlist',
        category: 'Subscriptions',
        action: TRAKT_COMMANDS.sync,
      },
      {
        cmd: '/trakt_download',
        description: 'Sync the Trakt watchlist and download what is found',
        category: 'Subscriptions',
        action: TRAKT_COMMANDS.download,
      },
    ];
  }

  async onCommand(action: string): Promise<string | null> {
    if (action !== TRAKT_COMMANDS.sync && action !== TRAKT_COMMANDS.download) {
      return null;
    }

    this.logger.info('Command received, starting sync', { action });
    const result = await this.sync(action === TRAKT_COMMANDS.download ? true : undefined);
    if (!result.success) {
      return `Trakt watchlist sync failed: ${result.errors.join('; ')}`;
    }
    return `Trakt watchlist sync finished\n${formatStats(result)}`;
  }

  getApi(): PluginApiRoute[] {
    return [
      {
        path: '/oauth/exchange',
        method: 'POST',
        summary: 'Exchange an authorization code for tokens',
        handler: async ({ body }) => {
          const parsed = exchangeBodySchema.safeParse(body);
          if (!parsed.success) {
            return { success: false, error: 'code is required' };
          }
          try {
            const tokens = await this.authorize(parsed.data.code);
            return { success: true, expiresAt: tokens.expiresAt?.toISOString() ?? null };
          } catch (error) {
            return { success: false, error: error instanceof Error ? error.message : String(error) };
          }
        },
      },
      {
        path: '/stats',
        method: 'GET',
        summary: 'Result of the last successful sync',
        handler: async () => ({
          lastSyncAt: this.state.lastSyncAt?.toISOString() ?? null,
          stats: this.state.lastSync?.stats ?? null,
          tokenExpiresAt: this.state.settings.tokenExpiresAt || null,
          syncing: this.service?.isSyncing() ?? false,
        }),
      },
      {
        path: '/sync',
        method: 'POST',
        summary: 'Sync the watchlist now',
        handler: async ({ query }) => this.sync(query.download === 'true' ? true : undefined),
      },
    ];
  }

  getForm(): UiNode[] {
    return [
      form(
        row(
          col({ md: 4 }, switchField('enabled', 'Enable plugin')),
          col({ md: 4 }, switchField('notify', 'Send notifications')),
          col({ md: 4 }, switchField('onlyonce', 'Run once')),
        ),
        row(
          col({ md: 4 }, switchField('autoDownload', 'Search and download', 'Download right away instead of only subscribing')),
          col({ md: 4 }, switchField('proxy', 'Use proxy', 'Reach Trakt through the system proxy')),
          col({ md: 4 }, textField('cron', 'Sync schedule', { placeholder: '0 8 * * *', hint: 'Cron expression; once a day when empty' })),
        ),
        row(
          col({ md: 6 }, textField('clientId', 'Client ID', { hint: 'From your Trakt API application' })),
          col({ md: 6 }, textField('clientSecret', 'Client secret', { secret: true })),
        ),
        row(
          col({ md: 6 }, textField('refreshToken', 'Refresh token', { secret: true, hint: 'Filled in after authorization' })),
          col({ md: 6 }, textField('customLists', 'Custom lists', { placeholder: 'user/list-id, user/other-list', hint: 'Trakt lists synced next to the watchlist' })),
        ),
        row(
          col({}, alert('info', 'Create an API application at trakt.tv with the redirect URI urn:ietf:wg:oauth:2.0:oob, then post the authorization code to /oauth/exchange.')),
        ),
      ),
    ];
  }

  getPage(): UiNode[] {
    const { lastSync, lastSyncAt, settings } = this.state;
    const status = [settings.enabled ? 'Status: running' : 'Status: stopped'];
    if (lastSyncAt) {
      status.push(`Last sync: ${formatDateTime(lastSyncAt)}`);
    }
    const expiry = parseExpiry(settings.tokenExpiresAt);
    if (expiry) {
      status.push(`Token expires: ${formatDateTime(expiry)}`);
    }

    const nodes = [row(col({}, alert(settings.enabled ? 'success' : 'info', status.join(' | '))))];
    if (lastSync) {
      const { stats } = lastSync;
      nodes.push(row(col({}, table(
        ['', 'Added', 'Existing'],
        [
          ['Movies', String(stats.moviesAdded), String(stats.moviesExisting)],
          ['Shows', String(stats.showsAdded), String(stats.showsExisting)],
        ]
      ))));
    }
    return nodes;
  }
}
