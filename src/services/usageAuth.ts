import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import crypto from 'crypto';

function sameToken(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Guards every route of the plugin it is registered in. Without an API token
 * the routes are open.
 */
export function registerUsageAuth(app: FastifyInstance, apiToken: string | undefined): void {
  if (!apiToken) return;

  app.addHook('preHandler', async (req: FastifyRequest, reply: FastifyReply) => {
    const header = req.headers['x-api-token'];
    const auth = req.headers['authorization'];
    const token = typeof header === 'string' ? header : auth?.replace(/^Bearer\s+/i, '');

    if (!token || !sameToken(token, apiToken)) {
      return reply.code(403).send({ error: 'forbidden' });
    }
  });
}
