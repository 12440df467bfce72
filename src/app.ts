import Fastify, { type FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import type { AppConfig } from './lib/config.js';
import { isConnected } from './lib/connection.js';
import { NotConnectedError, VmcApiError } from './lib/errors.js';
import usageRoutes from './routes/usage.js';

export function buildApp(config: Pick<AppConfig, 'logLevel' | 'apiToken'>): FastifyInstance {
  const app = Fastify({ logger: { level: config.logLevel } });

  app.setErrorHandler((error: Error, req, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'invalid_request', issues: error.issues });
    }
    if (error instanceof NotConnectedError) {
      return reply.code(503).send({ error: 'not_connected' });
    }
    if (error instanceof VmcApiError) {
      req.log.warn({ status: error.status, path: error.path }, 'upstream error');
      return reply.code(502).send({ error: 'upstream_error', status: error.status });
    }
    req.log.error(error);
    return reply.code(500).send({ error: 'internal_error' });
  });

  app.get('/health', async () => ({ ok: true, connected: isConnected() }));

  void app.register(usageRoutes, { prefix: '/usage', apiToken: config.apiToken });

  return app;
}
