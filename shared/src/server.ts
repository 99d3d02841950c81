/**
 * Plugin HTTP API
 * Fastify routes shared by every plugin server: health probes, settings,
 * UI descriptions, plugin API routes, commands, site search and agent tools
 */

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import type { HostError, PluginHost } from './host.js';
import type { PluginStorage } from './storage.js';
import { ApiRateLimiter, createAuthHook, createRateLimitHook, type SecurityConfig } from './security.js';
import { formatZodError } from './validation.js';
import { createLogger } from './logger.js';

export interface PluginServerOptions {
  /** Service name reported by the health endpoints */
  name: string;
  version: string;
  port: number;
  host: string;
  security: SecurityConfig;
  storage: PluginStorage;
}

export interface PluginServer {
  app: FastifyInstance;
  pluginHost: PluginHost;
  start(): Promise<void>;
  stop(): Promise<void>;
}

const settingsPatchSchema = z.record(z.unknown());

const searchBodySchema = z.object({
  domain: z.string().trim().min(1),
  keyword: z.string(),
  mtype: z.enum(['movie', 'tv']).optional(),
  page: z.number().int().min(0).optional(),
});

const commandBodySchema = z.object({
  cmd: z.string().trim().min(1),
});

interface IdParams {
  id: string;
}

interface PluginApiParams extends IdParams {
  '*': string;
}

const HOST_ERROR_STATUS: Record<HostError['code'], number> = {
  not_found: 404,
  invalid_settings: 400,
  unavailable: 503,
};

function sendHostError(reply: FastifyReply, error: HostError) {
  return reply.status(HOST_ERROR_STATUS[error.code]).send({ error: error.message });
}

function sendValidationError(reply: FastifyReply, error: z.ZodError) {
  return reply.status(400).send({ error: formatZodError(error), details: error.issues });
}

/** Flattens a parsed query string to single string values; repeated keys keep the last value. */
function toQueryRecord(query: unknown): Record<string, string | undefined> {
  const record: Record<string, string | undefined> = {};
  if (typeof query !== 'object' || query === null) {
    return record;
  }

  for (const [key, value] of Object.entries(query)) {
    if (typeof value === 'string') {
      record[key] = value;
    } else if (Array.isArray(value)) {
      const last = value[value.length - 1];
      record[key] = typeof last === 'string' ? last : undefined;
    }
  }
  return record;
}

export async function createPluginServer(pluginHost: PluginHost, options: PluginServerOptions): Promise<PluginServer> {
  const logger = createLogger(`${options.name}:server`);

  const app = Fastify({
    logger: false,
    bodyLimit: 1024 * 1024,
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  const rateLimiter = new ApiRateLimiter(
    options.security.rateLimitMax ?? 100,
    options.security.rateLimitWindowMs ?? 60000
  );

  app.addHook('preHandler', createRateLimitHook(rateLimiter));

  // Health probes stay open
  if (options.security.apiKey) {
    app.addHook('preHandler', createAuthHook(options.security.apiKey));
    logger.info('API key authentication enabled');
  }

  app.get('/health', async () => {
    return { status: 'ok', plugin: options.name, timestamp: new Date().toISOString() };
  });

  app.get('/ready', async (_request, reply) => {
    const ready = await options.storage.ping();
    if (!ready) {
      return reply.status(503).send({
        ready: false,
        plugin: options.name,
        error: 'Storage unavailable',
        timestamp: new Date().toISOString(),
      });
    }
    return { ready: true, plugin: options.name, timestamp: new Date().toISOString() };
  });

  app.get('/live', async () => {
    return {
      alive: true,
      plugin: options.name,
      version: options.version,
      uptime: process.uptime(),
      memory: process.memoryUsage(),
      timestamp: new Date().toISOString(),
    };
  });

  app.get('/v1/status', async () => {
    const sites = await pluginHost.listSites();
    return {
      plugin: options.name,
      version: options.version,
      status: 'running',
      plugins: pluginHost.listPlugins(),
      sites: sites.length,
      timestamp: new Date().toISOString(),
    };
  });

  // =========================================================================
  // Plugins
  // =========================================================================

  app.get('/v1/plugins', async () => {
    return { data: pluginHost.listPlugins() };
  });

  app.get<{ Params: IdParams }>('/v1/plugins/:id', async (request, reply) => {
    const summary = pluginHost.describePlugin(request.params.id);
    if (!summary) {
      return reply.status(404).send({ error: 'Plugin not found' });
    }
    return summary;
  });

  app.get<{ Params: IdParams }>('/v1/plugins/:id/config', async (request, reply) => {
    const stored = pluginHost.getStoredSettings(request.params.id);
    if (!stored) {
      return reply.status(404).send({ error: 'Plugin not found' });
    }
    return stored;
  });

  app.put<{ Params: IdParams }>('/v1/plugins/:id/config', async (request, reply) => {
    const patch = settingsPatchSchema.safeParse(request.body);
    if (!patch.success) {
      return sendValidationError(reply, patch.error);
    }

    const result = await pluginHost.updateConfig(request.params.id, patch.data);
    if (!result.ok) {
      return sendHostError(reply, result.error);
    }
    return result.value;
  });

  app.get<{ Params: IdParams }>('/v1/plugins/:id/form', async (request, reply) => {
    const { id } = request.params;
    const plugin = pluginHost.getPlugin(id);
    if (!plugin) {
      return reply.status(404).send({ error: 'Plugin not found' });
    }
    return { form: plugin.getForm(), model: pluginHost.getSettings(id) ?? pluginHost.getStoredSettings(id) };
  });

  app.get<{ Params: IdParams }>('/v1/plugins/:id/page', async (request, reply) => {
    const plugin = pluginHost.getPlugin(request.params.id);
    if (!plugin) {
      return reply.status(404).send({ error: 'Plugin not found' });
    }
    return { page: plugin.getPage() };
  });

  app.get<{ Params: IdParams }>('/v1/plugins/:id/commands', async (request, reply) => {
    const { id } = request.params;
    if (!pluginHost.getPlugin(id)) {
      return reply.status(404).send({ error: 'Plugin not found' });
    }
    return { data: pluginHost.listCommands().filter(command => command.pluginId === id) };
  });

  app.route<{ Params: PluginApiParams }>({
    method: ['GET', 'POST'],
    url: '/v1/plugins/:id/api/*',
    handler: async (request, reply) => {
      const { id } = request.params;
      const path = `/${request.params['*']}`.replace(/\/+$/, '') || '/';
      const method = request.method === 'POST' ? 'POST' : 'GET';

      if (!pluginHost.getPlugin(id)) {
        return reply.status(404).send({ error: 'Plugin not found' });
      }

      const route = pluginHost.findApiRoute(id, method, path);
      if (!route) {
        return reply.status(404).send({ error: `No ${method} ${path} route on plugin ${id}` });
      }

      try {
        return await route.handler({ query: toQueryRecord(request.query), body: request.body ?? null });
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error('Plugin API route failed', { id, path, error: message });
        return reply.status(500).send({ error: message });
      }
    },
  });

  // =========================================================================
  // Commands
  // =========================================================================

  app.get('/v1/commands', async () => {
    return { data: pluginHost.listCommands() };
  });

  app.post('/v1/commands', async (request, reply) => {
    const body = commandBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const result = await pluginHost.runCommand(body.data.cmd);
    if (!result.ok) {
      return sendHostError(reply, result.error);
    }
    return { reply: result.value };
  });

  // =========================================================================
  // Sites and search
  // =========================================================================

  app.get('/v1/sites', async () => {
    const sites = await pluginHost.listSites();
    return { data: sites, total: sites.length };
  });

  app.post('/v1/search', async (request, reply) => {
    const body = searchBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(reply, body.error);
    }

    const { domain, keyword, mtype, page } = body.data;
    const result = await pluginHost.search(domain, {
      keyword,
      mtype,
      page: page ?? 0,
    });
    if (!result.ok) {
      return sendHostError(reply, result.error);
    }

    return {
      site: result.value.site.name,
      plugin: result.value.pluginId,
      results: result.value.results,
      count: result.value.results.length,
    };
  });

  // =========================================================================
  // Agent tools
  // =========================================================================

  app.get('/v1/tools', async () => {
    return {
      data: pluginHost.listTools().map(({ name, description, parameters, pluginId }) => ({
        name,
        description,
        parameters,
        pluginId,
      })),
    };
  });

  app.post<{ Params: { name: string } }>('/v1/tools/:name', async (request, reply) => {
    const result = await pluginHost.runTool(request.params.name, request.body ?? {});
    if (!result.ok) {
      return sendHostError(reply, result.error);
    }
    return { output: result.value };
  });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await pluginHost.shutdown();
    await app.close();
    rateLimiter.dispose();
    await options.storage.close();
  };

  return {
    app,
    pluginHost,
    start: async () => {
      await app.listen({ port: options.port, host: options.host });
      logger.success(`${options.name} server running on http://${options.host}:${options.port}`);
    },
    stop: shutdown,
  };
}
