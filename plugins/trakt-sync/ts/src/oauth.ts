/**
 * OAuth token lifecycle
 *
 * A token is valid while its expiry is more than the refresh threshold away.
 * Otherwise one refresh_token grant is sent; on success the new pair and
 * expiry replace the old ones and are persisted, on failure the previous
 * token is kept and nothing is retried until the next call.
 */

import { createLogger, describeError, err, ok, pluginError, type Result } from '@mediabridge/plugin-utils';
import type { TokenGrants } from './client.js';
import type { TokenState, TraktToken } from './types.js';

const logger = createLogger('trakt-sync:oauth');

const DAY_MS = 24 * 60 * 60 * 1000;
/** Trakt tokens whose response omits `expires_in` are assumed to last a day */
export const DEFAULT_EXPIRES_IN_SECONDS = 86400;
export const DEFAULT_REFRESH_THRESHOLD_DAYS = 7;

export interface TokenManagerOptions {
  grants: TokenGrants;
  initial: TokenState;
  /** Called with the new state after every successful grant */
  persist(state: TokenState): Promise<void>;
  refreshThresholdDays?: number;
  now?: () => Date;
}

export class TokenManager {
  private readonly grants: TokenGrants;
  private readonly persist: (state: TokenState) => Promise<void>;
  private readonly thresholdMs: number;
  private readonly now: () => Date;
  private state: TokenState;

  constructor(options: TokenManagerOptions) {
    this.grants = options.grants;
    this.persist = options.persist;
    this.thresholdMs = (options.refreshThresholdDays ?? DEFAULT_REFRESH_THRESHOLD_DAYS) * DAY_MS;
    this.now = options.now ?? (() => new Date());
    this.state = { ...options.initial };
  }

  getState(): TokenState {
    return { ...this.state };
  }

  isValid(): boolean {
    const { accessToken, expiresAt } = this.state;
    if (!accessToken || !expiresAt) {
      return false;
    }
    return expiresAt.getTime() - this.now().getTime() > this.thresholdMs;
  }

  /** The current access token, refreshed first when it is close to expiry */
  async ensureFresh(): Promise<Result<string>> {
    if (this.isValid()) {
      logger.debug('Access token still valid', { expiresAt: this.state.expiresAt?.toISOString() });
      return ok(this.state.accessToken);
    }

    if (!this.state.refreshToken) {
      return err(pluginError('upstream_unavailable', 'No refresh token configured'));
    }

    logger.info('Refreshing Trakt access token');
    const result = await this.grants.refreshToken(this.state.refreshToken);
    if (!result.ok) {
      logger.error('Token refresh failed, keeping the previous token', {
        kind: result.error.kind,
        status: result.error.status,
        error: result.error.message,
      });
      return result;
    }

    await this.apply(result.value);
    return ok(this.state.accessToken);
  }

  /** Completes the authorization code flow */
  async exchangeCode(code: string): Promise<Result<TokenState>> {
    const result = await this.grants.exchangeCode(code.trim());
    if (!result.ok) {
      logger.error('Authorization code exchange failed', { status: result.error.status, error: result.error.message });
      return result;
    }

    await this.apply(result.value);
    return ok(this.getState());
  }

  private async apply(token: TraktToken): Promise<void> {
    const expiresIn = token.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    this.state = {
      accessToken: token.access_token,
      refreshToken: token.refresh_token || this.state.refreshToken,
      expiresAt: new Date(this.now().getTime() + expiresIn * 1000),
    };

    try {
      await this.persist(this.getState());
    } catch (error) {
      // The new token stays usable for this process even if it was not saved
      logger.error('Failed to persist refreshed token', { error: describeError(error) });
    }
    logger.info('Access token updated', { expiresAt: this.state.expiresAt?.toISOString() });
  }
}
