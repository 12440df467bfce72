import fetch from 'cross-fetch';
import { z } from 'zod';
import { DEFAULT_CSP_SERVER, DEFAULT_VMC_SERVER } from '../lib/config.js';
import { setConnection, type Connection } from '../lib/connection.js';
import { AuthenticationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { serverUrl } from '../lib/url.js';

export const TOKEN_EXCHANGE_PATH = '/csp/gateway/am/api/auth/api-tokens/authorize';

export const connectOptionsSchema = z.object({
  refreshToken: z.string().trim().min(1),
  orgId: z.string().trim().min(1),
  cspServer: z.string().trim().min(1).default(DEFAULT_CSP_SERVER),
  vmcServer: z.string().trim().min(1).default(DEFAULT_VMC_SERVER),
});

export type ConnectOptions = z.input<typeof connectOptionsSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
});

export function buildHeaders(accessToken: string): Record<string, string> {
  return {
    'csp-auth-token': accessToken,
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
}

/**
 * Exchanges a refresh token for an access token and stores the resulting
 * connection for the reporters. The token is not renewed; reconnect once it
 * expires.
 */
export async function connect(opts: ConnectOptions): Promise<Connection> {
  const checked = connectOptionsSchema.safeParse(opts);
  if (!checked.success) {
    const fields = Array.from(new Set(checked.error.issues.map((i) => i.path.join('.'))));
    throw new AuthenticationError(`Missing or empty connect options: ${fields.join(', ')}`);
  }
  const cfg = checked.data;

  const body = new URLSearchParams();
  body.set('refresh_token', cfg.refreshToken);

  const tokenUrl = serverUrl(cfg.cspServer, TOKEN_EXCHANGE_PATH);
  let resp: Response;
  try {
    resp = await fetch(tokenUrl, {
      method: 'POST',
      headers: {
        'content-type': 'application/x-www-form-urlencoded',
        accept: 'application/json',
      },
      body: body.toString(),
    });
  } catch (err) {
    logger.error({ err, cspServer: cfg.cspServer }, 'token exchange request failed');
    throw err;
  }

  if (!resp.ok) {
    logger.warn({ status: resp.status, cspServer: cfg.cspServer }, 'token exchange rejected');
    throw new AuthenticationError(`Token exchange failed: ${resp.status}`, resp.status);
  }

  const json: unknown = await resp.json().catch(() => ({}));
  const token = tokenResponseSchema.safeParse(json);
  if (!token.success) {
    throw new AuthenticationError('Token exchange returned no access_token', resp.status);
  }

  const connection: Connection = {
    cspServer: cfg.cspServer,
    vmcServer: cfg.vmcServer,
    orgId: cfg.orgId,
    headers: buildHeaders(token.data.access_token),
  };
  setConnection(connection);
  logger.info(
    { orgId: cfg.orgId, vmcServer: cfg.vmcServer, expiresIn: token.data.expires_in },
    'connected',
  );
  return connection;
}
