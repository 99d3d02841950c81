/**
 * API key authentication and per-client rate limiting for plugin servers
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { createLogger } from './logger.js';

const logger = createLogger('security');

/** Reachable without a key so orchestrators can probe the server */
const PUBLIC_PATHS = new Set(['/health', '/ready', '/live']);

export interface SecurityConfig {
  /** Without a key every request is accepted */
  apiKey?: string;
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
}

interface RateWindow {
  count: number;
  resetAt: number;
}

/** Fixed-window request counter keyed by client address */
export class ApiRateLimiter {
  readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly windows = new Map<string, RateWindow>();
  private readonly sweeper: NodeJS.Timeout;

  constructor(maxRequests = 100, windowMs = 60000) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.sweeper = setInterval(() => this.sweep(), windowMs);
    this.sweeper.unref();
  }

  private current(key: string, now: number): RateWindow {
    const existing = this.windows.get(key);
    if (existing && now <= existing.resetAt) {
      return existing;
    }
    const fresh = { count: 0, resetAt: now + this.windowMs };
    this.windows.set(key, fresh);
    return fresh;
  }

  /** Counts a request; false once the window is used up */
  take(key: string, now = Date.now()): { allowed: boolean; remaining: number; resetAt: number } {
    const window = this.current(key, now);
    const allowed = window.count < this.maxRequests;
    if (allowed) {
      window.count++;
    }
    return { allowed, remaining: this.maxRequests - window.count, resetAt: window.resetAt };
  }

  dispose(): void {
    clearInterval(this.sweeper);
    this.windows.clear();
  }

  private sweep(): void {
    const now = Date.now();
    for (const [key, window] of this.windows) {
      if (now > window.resetAt) {
        this.windows.delete(key);
      }
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** `Authorization: Bearer <key>` or `X-API-Key: <key>` */
export function extractApiKey(headers: FastifyRequest['headers']): string | undefined {
  const authorization = firstHeader(headers.authorization);
  if (authorization?.startsWith('Bearer ')) {
    return authorization.slice('Bearer '.length);
  }
  return firstHeader(headers['x-api-key']);
}

export function apiKeyMatches(provided: string | undefined, expected: string): boolean {
  if (!provided) {
    return false;
  }
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Reads `<PREFIX>_API_KEY`, `<PREFIX>_RATE_LIMIT_MAX` and
 * `<PREFIX>_RATE_LIMIT_WINDOW_MS`, falling back to the unprefixed
 * MEDIABRIDGE_API_KEY, RATE_LIMIT_MAX and RATE_LIMIT_WINDOW_MS.
 */
export function loadSecurityConfig(prefix: string, env: NodeJS.ProcessEnv = process.env): SecurityConfig {
  const envPrefix = prefix.toUpperCase();
  const apiKey = env[`${envPrefix}_API_KEY`] || env.MEDIABRIDGE_API_KEY || undefined;

  if (!apiKey && env.NODE_ENV === 'production') {
    logger.warn(`${envPrefix}_API_KEY is not set; the HTTP API accepts unauthenticated requests`);
  }

  return {
    apiKey,
    rateLimitMax: parseInt(env[`${envPrefix}_RATE_LIMIT_MAX`] || env.RATE_LIMIT_MAX || '100', 10),
    rateLimitWindowMs: parseInt(env[`${envPrefix}_RATE_LIMIT_WINDOW_MS`] || env.RATE_LIMIT_WINDOW_MS || '60000', 10),
  };
}

export function createAuthHook(apiKey: string) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (PUBLIC_PATHS.has(request.url)) {
      return;
    }

    const provided = extractApiKey(request.headers);
    if (!apiKeyMatches(provided, apiKey)) {
      const error = provided ? 'Invalid API key' : 'API key required';
      logger.warn('Authentication failed', { error, path: request.url });
      return reply.status(401).send({ error });
    }
  };
}

export function createRateLimitHook(limiter: ApiRateLimiter) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const key = request.ip || 'unknown';
    const now = Date.now();
    const { allowed, remaining, resetAt } = limiter.take(key, now);

    reply.header('X-RateLimit-Limit', String(limiter.maxRequests));
    reply.header('X-RateLimit-Remaining', String(remaining));
    reply.header('X-RateLimit-Reset', String(Math.ceil(resetAt / 1000)));

    if (!allowed) {
      logger.warn('Rate limit exceeded', { ip: key });
      reply.header('Retry-After', String(Math.max(1, Math.ceil((resetAt - now) / 1000))));
      return reply.status(429).send({ error: 'Too many requests' });
    }
  };
}
