import fetch from 'cross-fetch';
import { z } from 'zod';
import type { Connection } from './connection.js';
import { VmcApiError } from './errors.js';
import { logger } from './logger.js';
import { expandPath, serverUrl } from './url.js';

export const DEPLOYMENT_USAGE_PATH = '/vmc/api/orgs/{orgId}/usage/deployments';
export const SUBSCRIPTIONS_PATH = '/vmc/api/orgs/{orgId}/subscriptions';

/**
 * Accepts a collection either as a bare array or as a `{ content: [...] }` page.
 * Only the page that was returned is read; there is no paging through `next`.
 */
export function collectionOf<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess(
    (raw) =>
      raw !== null && typeof raw === 'object' && !Array.isArray(raw) && 'content' in raw
        ? raw.content
        : raw,
    z.array(item),
  );
}

export async function vmcGet<T>(
  connection: Connection,
  pathTemplate: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const path = expandPath(pathTemplate, { orgId: connection.orgId });
  const url = serverUrl(connection.vmcServer, path);

  logger.debug({ url }, 'vmc GET');
  const res = await fetch(url, { method: 'GET', headers: connection.headers });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new VmcApiError(res.status, text, path);
  }

  const json: unknown = await res.json();
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    // A body we cannot read is an upstream failure, not a bad caller request.
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new VmcApiError(res.status, `unexpected response: ${issues}`, path);
  }
  return parsed.data;
}
