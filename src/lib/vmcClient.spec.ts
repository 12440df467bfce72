import { describe, it, expect, vi, beforeEach } from 'vitest';
import fetch from 'cross-fetch';
import { z } from 'zod';
import type { Connection } from './connection.js';
import { VmcApiError } from './errors.js';
import { collectionOf, SUBSCRIPTIONS_PATH, vmcGet } from './vmcClient.js';

vi.mock('cross-fetch', () => ({
  default: vi.fn(),
}));

const fetchMock = vi.mocked(fetch);

const conn: Connection = {
  cspServer: 'csp.example.test',
  vmcServer: 'vmc.example.test',
  orgId: 'org-1',
  headers: { 'csp-auth-token': 'test-access-token', Accept: 'application/json' },
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const itemSchema = z.object({ id: z.string() });

describe('vmcClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('vmcGet', () => {
    it('sends the connection headers to the expanded path', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([{ id: 'a' }]));

      const result = await vmcGet(conn, SUBSCRIPTIONS_PATH, collectionOf(itemSchema));

      expect(fetchMock).toHaveBeenCalledWith(
        'https://vmc.example.test/vmc/api/orgs/org-1/subscriptions',
        { method: 'GET', headers: conn.headers },
      );
      expect(result).toEqual([{ id: 'a' }]);
    });

    it('throws VmcApiError on a non-2xx answer', async () => {
      fetchMock.mockResolvedValueOnce(new Response('token expired', { status: 401 }));

      const err = await vmcGet(conn, SUBSCRIPTIONS_PATH, itemSchema).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(VmcApiError);
      if (!(err instanceof VmcApiError)) return;
      expect(err.status).toBe(401);
      expect(err.body).toBe('token expired');
      expect(err.path).toBe('/vmc/api/orgs/org-1/subscriptions');
      expect(err.isAuthError).toBe(true);
      expect(err.isNotFound).toBe(false);
      expect(err.message).toBe('VMC API error: 401 /vmc/api/orgs/org-1/subscriptions token expired');
    });

    it('reports a body that does not match the schema as an API error', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ unexpected: true }));

      const err = await vmcGet(conn, SUBSCRIPTIONS_PATH, collectionOf(itemSchema)).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(VmcApiError);
      if (!(err instanceof VmcApiError)) return;
      expect(err.status).toBe(200);
      expect(err.body).toBe('unexpected response: (root): Expected array, received object');
    });

    it('names the path of a missing field', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([{ id: 'a' }, { name: 'no-id' }]));

      await expect(vmcGet(conn, SUBSCRIPTIONS_PATH, collectionOf(itemSchema)))
        .rejects.toThrow('unexpected response: 1.id: Required');
    });

    it('propagates network failures', async () => {
      fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));

      await expect(vmcGet(conn, SUBSCRIPTIONS_PATH, itemSchema)).rejects.toThrow('ECONNRESET');
    });
  });

  describe('collectionOf', () => {
    const schema = collectionOf(itemSchema);

    it('accepts a bare array', () => {
      expect(schema.parse([{ id: 'a' }, { id: 'b' }])).toEqual([{ id: 'a' }, { id: 'b' }]);
    });

    it('unwraps a content page', () => {
      expect(schema.parse({ content: [{ id: 'a' }], total: 1 })).toEqual([{ id: 'a' }]);
    });
  });
});
