import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../config.js', () => ({
  getConfig: () => ({
    METABASE_URL: 'http://metabase.test',
    METABASE_USERNAME: 'analyst@example.com',
    METABASE_PASSWORD: 'test-secret',
    SESSION_TTL_HOURS: 1,
    LOG_LEVEL: 'silent',
  }),
}));

vi.mock('../../utils/logger.js', () => {
  const noopLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
    child: () => noopLogger,
  };
  return { getLogger: () => noopLogger };
});

import { MetabaseClient } from '../client.js';
import { createSession } from '../session.js';
import { PipelineError } from '../../errors.js';

const mockFetch = vi.fn();
const session = createSession('session-token', 3_600_000);

function respond(status: number, body: unknown): void {
  mockFetch.mockResolvedValueOnce({
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(typeof body === 'string' ? body : JSON.stringify(body)),
  });
}

async function rejection(promise: Promise<unknown>): Promise<PipelineError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof PipelineError) return err;
    throw err;
  }
  throw new Error('expected the call to fail');
}

describe('MetabaseClient', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('login()', () => {
    it('posts credentials and returns a session', async () => {
      respond(200, { id: 'abc-123' });

      const client = new MetabaseClient();
      const result = await client.login();

      const [url, opts] = mockFetch.mock.calls[0];
      expect(url).toBe('http://metabase.test/api/session');
      expect(opts.method).toBe('POST');
      expect(JSON.parse(opts.body)).toEqual({ username: 'analyst@example.com', password: 'test-secret' });
      expect(result.id).toBe('abc-123');
      expect(result.expiresAt.getTime() - result.issuedAt.getTime()).toBe(3_600_000);
    });

    it('maps rejected credentials to AUTHENTICATION_FAILURE', async () => {
      respond(400, { errors: { password: 'did not match stored password' } });

      const error = await rejection(new MetabaseClient().login());

      expect(error.code).toBe('AUTHENTICATION_FAILURE');
      expect(error.message).toContain('did not match stored password');
    });

    it('treats a response without an id as an authentication failure', async () => {
      respond(200, {});

      const error = await rejection(new MetabaseClient().login());

      expect(error.code).toBe('AUTHENTICATION_FAILURE');
    });
  });

  describe('request errors', () => {
    it('sends the session header', async () => {
      respond(200, [{ id: 1, name: 'orders', db_id: 1 }]);

      await new MetabaseClient().listTables(session);

      const [url, opts] = mockFetch.mock.calls[0];
      expect(url).toBe('http://metabase.test/api/table');
      expect(opts.headers['X-Metabase-Session']).toBe('session-token');
    });

    it.each([
      [401, 'AUTHENTICATION_FAILURE'],
      [403, 'AUTHENTICATION_FAILURE'],
      [404, 'NOT_FOUND'],
      [429, 'SERVICE_UNAVAILABLE'],
      [503, 'SERVICE_UNAVAILABLE'],
      [400, 'METABASE_ERROR'],
    ])('maps HTTP %i to %s', async (status, code) => {
      respond(status, { message: 'nope' });

      const error = await rejection(new MetabaseClient().listTables(session));

      expect(error.code).toBe(code);
    });

    it('maps network failures to SERVICE_UNAVAILABLE', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      const error = await rejection(new MetabaseClient().listTables(session));

      expect(error.code).toBe('SERVICE_UNAVAILABLE');
      expect(error.message).toBe('Metabase unavailable: fetch failed');
    });

    it('maps timeouts to SERVICE_UNAVAILABLE', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      mockFetch.mockRejectedValueOnce(timeout);

      const error = await rejection(new MetabaseClient().listTables(session));

      expect(error.code).toBe('SERVICE_UNAVAILABLE');
      expect(error.message).toBe('Metabase unavailable: GET /api/table timed out after 60000ms');
    });
  });

  describe('listDatabases()', () => {
    it('accepts a wrapped list', async () => {
      respond(200, { data: [{ id: 2, name: 'warehouse' }], total: 1 });

      const databases = await new MetabaseClient().listDatabases(session);

      expect(databases).toEqual([{ id: 2, name: 'warehouse' }]);
    });
  });

  describe('runNativeQuery()', () => {
    it('posts a native dataset query and counts rows', async () => {
      respond(202, {
        status: 'completed',
        running_time: 12,
        data: { rows: [[1], [2]], cols: [{ name: 'total' }] },
      });

      const result = await new MetabaseClient().runNativeQuery(session, 3, 'SELECT 1 FROM orders', 5000);

      const [url, opts] = mockFetch.mock.calls[0];
      expect(url).toBe('http://metabase.test/api/dataset');
      expect(JSON.parse(opts.body)).toEqual({
        type: 'native',
        native: { query: 'SELECT 1 FROM orders', 'template-tags': {} },
        database: 3,
      });
      expect(result).toEqual({ rowCount: 2, columns: ['total'], runningTimeMs: 12 });
    });

    it('turns a failed status into QUERY_FAILED with the database message', async () => {
      respond(202, { status: 'failed', error: 'ERROR: column "total" does not exist' });

      const error = await rejection(new MetabaseClient().runNativeQuery(session, 3, 'SELECT total FROM orders'));

      expect(error.code).toBe('QUERY_FAILED');
      expect(error.message).toBe('ERROR: column "total" does not exist');
    });

    it('turns a 400 into QUERY_FAILED', async () => {
      respond(400, { message: 'syntax error at or near "FORM"' });

      const error = await rejection(new MetabaseClient().runNativeQuery(session, 3, 'SELECT 1 FORM orders'));

      expect(error.code).toBe('QUERY_FAILED');
      expect(error.message).toBe('Metabase API error: syntax error at or near "FORM"');
    });
  });

  describe('collections and cards', () => {
    it('lists card items from a wrapped response', async () => {
      respond(200, { data: [{ id: 7, name: 'orders - Revenue', model: 'card' }] });

      const items = await new MetabaseClient().listCollectionItems(session, 5);

      expect(mockFetch.mock.calls[0][0]).toBe('http://metabase.test/api/collection/5/items');
      expect(items).toEqual([{ id: 7, name: 'orders - Revenue', model: 'card' }]);
    });

    it('deletes a card', async () => {
      respond(204, '');

      await new MetabaseClient().deleteCard(session, 7);

      const [url, opts] = mockFetch.mock.calls[0];
      expect(url).toBe('http://metabase.test/api/card/7');
      expect(opts.method).toBe('DELETE');
    });
  });
});
