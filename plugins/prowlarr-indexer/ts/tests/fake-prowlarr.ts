/**
 * In-process stand-in for the Prowlarr REST API
 */

import { readFileSync } from 'node:fs';
import Fastify, { type FastifyInstance } from 'fastify';

export const TEST_API_KEY = 'test-api-key';

export function fixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8'));
}

export type RecordedQuery = Record<string, string | string[]>;

export interface FakeProwlarr {
  app: FastifyInstance;
  baseUrl: string;
  /** Query strings of every search call, in order */
  searches: RecordedQuery[];
  close(): Promise<void>;
}

export async function startFakeProwlarr(): Promise<FakeProwlarr> {
  const app = Fastify({ logger: false });
  const searches: RecordedQuery[] = [];

  app.addHook('onRequest', async (request, reply) => {
    if (request.headers['x-api-key'] !== TEST_API_KEY) {
      return reply.status(401).send({ message: 'Unauthorized' });
    }
  });

  app.get('/api/v1/indexer', async () => fixture('indexers.json'));

  app.get('/api/v1/system/status', async () => ({
    appName: 'Prowlarr',
    instanceName: 'Prowlarr',
    version: '1.24.3.4754',
    osName: 'ubuntu',
  }));

  app.get<{ Querystring: RecordedQuery }>('/api/v1/search', async (request, reply) => {
    searches.push({ ...request.query });

    switch (request.query.indexerIds) {
      case '1':
        return fixture('search.json');
      case '98':
        return { message: 'not a list' };
      case '99':
        return reply.status(500).send({ message: 'Indexer exploded' });
      default:
        return [];
    }
  });

  await app.listen({ port: 0, host: '127.0.0.1' });
  const address = app.server.address();
  if (!address || typeof address !== 'object') {
    throw new Error('Fake Prowlarr did not bind to a port');
  }

  return {
    app,
    baseUrl: `http://127.0.0.1:${address.port}`,
    searches,
    close: () => app.close(),
  };
}
