import Fastify, { type FastifyServerOptions } from 'fastify';
import type { HaikuStorage } from './contracts/haikuStorage';
import { registerHaikuRoutes } from './routes/haikus';

export interface BuildAppOptions {
  storage: HaikuStorage;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp({ storage, logger = false }: BuildAppOptions) {
  const app = Fastify({ logger });

  app.get('/health', async () => {
    if (!storage.isAvailable()) {
      return { status: 'degraded', storage: 'unavailable' };
    }
    const reachable = await storage.probe();
    return reachable ? { status: 'ok', storage: 'ok' } : { status: 'degraded', storage: 'error' };
  });

  await registerHaikuRoutes(app, storage);
  return app;
}
