/**
 * HTTP client utilities for mediabridge plugins
 */

import axios, { type AxiosInstance } from 'axios';
import type { RetryConfig } from './types.js';
import { DEFAULT_RETRY_CONFIG } from './types.js';
import { withRetry } from './retry.js';
import { err, ok, pluginError, type PluginError, type Result } from './result.js';
import { createLogger } from './logger.js';

const logger = createLogger('http');

export type QueryValue = string | number | boolean | null | undefined | Array<string | number>;

export interface HttpClientConfig {
  baseUrl: string;
  headers?: Record<string, string>;
  timeout?: number;
  retryConfig?: RetryConfig;
  /** Route requests through the proxy configured in the environment */
  useProxy?: boolean;
}

export interface RequestOptions {
  params?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  timeout?: number;
  /** Set to false for calls that must be issued exactly once */
  retry?: boolean;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export class HttpError extends Error {
  status: number;
  response: string;

  constructor(status: number, message: string, response = '') {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.response = response;
  }
}

/**
 * Builds a query string; array values become repeated keys
 * (`categories=2000&categories=5000`), empty values are left out.
 */
export function buildQueryString(params: Record<string, QueryValue>): string {
  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null || value === '') {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        searchParams.append(key, String(item));
      }
    } else {
      searchParams.append(key, String(value));
    }
  }
  return searchParams.toString();
}

function isTransient(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}

export class HttpClient {
  private readonly http: AxiosInstance;
  private readonly retryConfig: RetryConfig;
  readonly baseUrl: string;

  constructor(config: HttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.retryConfig = config.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.http = axios.create({
      baseURL: this.baseUrl,
      headers: config.headers,
      timeout: config.timeout ?? 30000,
      proxy: config.useProxy ? undefined : false,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  private async request(
    method: 'GET' | 'POST',
    endpoint: string,
    options: RequestOptions & { body?: unknown } = {}
  ): Promise<Result<HttpResponse>> {
    const query = options.params ? buildQueryString(options.params) : '';
    const url = query ? `${endpoint}?${query}` : endpoint;
    const retryConfig = options.retry === false
      ? { ...this.retryConfig, maxRetries: 0 }
      : this.retryConfig;

    try {
      const response = await withRetry(async () => {
        const res = await this.http.request<unknown>({
          method,
          url,
          headers: options.headers,
          timeout: options.timeout,
          data: options.body === undefined ? undefined : JSON.stringify(options.body),
        });
        const body = typeof res.data === 'string' ? res.data : '';

        if (res.status < 200 || res.status >= 300) {
          throw new HttpError(res.status, `HTTP ${res.status}`, body);
        }

        return { status: res.status, body };
      }, retryConfig, isTransient);

      return ok(response);
    } catch (error) {
      return err(this.toPluginError(method, endpoint, error));
    }
  }

  private toPluginError(method: string, endpoint: string, error: unknown): PluginError {
    if (error instanceof HttpError) {
      logger.debug('Upstream returned an error status', {
        method,
        endpoint,
        status: error.status,
        body: error.response.substring(0, 500),
      });
      return pluginError('upstream_unavailable', `${method} ${endpoint} failed: ${error.message}`, error.status);
    }

    const message = error instanceof Error ? error.message : String(error);
    return pluginError('upstream_unavailable', `${method} ${endpoint} failed: ${message}`);
  }

  async getText(endpoint: string, options?: RequestOptions): Promise<Result<string>> {
    const response = await this.request('GET', endpoint, options);
    return response.ok ? ok(response.value.body) : response;
  }

  async getJson(endpoint: string, options?: RequestOptions): Promise<Result<unknown>> {
    const response = await this.request('GET', endpoint, {
      ...options,
      headers: { Accept: 'application/json', ...options?.headers },
    });
    return response.ok ? parseJson(endpoint, response.value.body) : response;
  }

  async postJson(endpoint: string, body: unknown, options?: RequestOptions): Promise<Result<unknown>> {
    const response = await this.request('POST', endpoint, {
      ...options,
      body,
      headers: { 'Content-Type': 'application/json', Accept: 'application/json', ...options?.headers },
    });
    return response.ok ? parseJson(endpoint, response.value.body) : response;
  }
}

function parseJson(endpoint: string, body: string): Result<unknown> {
  try {
    const parsed: unknown = JSON.parse(body);
    return ok(parsed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(pluginError('malformed_response', `${endpoint} did not return JSON: ${message}`));
  }
}
