/**
 * Airtable Client Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AirtableClient,
  AirtableConfigBuilder,
  MetricNames,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  ServerError,
  TimeoutError,
  configWithToken,
  createInMemoryObservability,
  type ClientSettingsInput,
} from '../index.js';
import { FakeAirtable, FAKE_BASE_URL, TEST_SETTINGS } from './helpers/fake-airtable.js';

function createClient(
  overrides: ClientSettingsInput = {},
  observability = createInMemoryObservability()
): AirtableClient {
  const settings = new AirtableConfigBuilder().withSettings(TEST_SETTINGS).withSettings(overrides).buildSettings();
  return new AirtableClient(configWithToken(settings, 'test-token'), observability);
}

describe('AirtableClient', () => {
  let fake: FakeAirtable;

  beforeEach(() => {
    fake = new FakeAirtable();
    vi.stubGlobal('fetch', vi.fn(fake.fetch));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('buildUrl', () => {
    it('keeps the base URL path prefix', () => {
      const client = createClient();
      expect(client.buildUrl('/appA/Tasks')).toBe(`${FAKE_BASE_URL}/appA/Tasks`);
    });

    it('repeats array values and drops undefined ones', () => {
      const client = createClient();
      const url = new URL(client.buildUrl('/appA/Tasks', { 'fields[]': ['Name', 'Status'], view: undefined, pageSize: 5 }));

      expect(url.searchParams.getAll('fields[]')).toEqual(['Name', 'Status']);
      expect(url.searchParams.has('view')).toBe(false);
      expect(url.searchParams.get('pageSize')).toBe('5');
    });
  });

  describe('requests', () => {
    it('sends bearer auth and JSON bodies', async () => {
      const client = createClient();
      await client.table('appA', 'Tasks').create({ Name: 'Test' });

      const [request] = fake.requests;
      expect(request?.method).toBe('POST');
      expect(request?.path).toBe('/appA/Tasks');
      expect(request?.headers['authorization']).toBe('Bearer test-token');
      expect(request?.headers['content-type']).toBe('application/json');
      expect(request?.headers['user-agent']).toBe('airtable-tools/0.1.0');
      expect(request?.body).toEqual({ fields: { Name: 'Test' } });
    });

    it('encodes table names in the path', async () => {
      const client = createClient();
      await client.table('appA', 'Open Tasks').all();

      expect(fake.requests[0]?.url.pathname).toBe('/v0/appA/Open%20Tasks');
    });

    it('records success metrics and spans', async () => {
      const observability = createInMemoryObservability();
      const client = createClient({}, observability);
      await client.bases();

      expect(observability.metrics.getCounter(MetricNames.OPERATIONS_TOTAL, { operation: 'GET', status: 'success' })).toBe(1);
      const [span] = observability.tracer.getSpansByName('airtable.request');
      expect(span?.attributes['http.status_code']).toBe(200);
    });
  });

  describe('errors', () => {
    it('maps 404 to NotFoundError', async () => {
      const client = createClient();
      await expect(client.table('appA', 'Tasks').get('recMissing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('maps 429 to RateLimitedError using Retry-After', async () => {
      const observability = createInMemoryObservability();
      const client = createClient({}, observability);
      fake.respondNext(429, { errors: [{ error: 'RATE_LIMIT_REACHED' }] }, { 'retry-after': '1' });

      const error = await client.bases().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ retryAfter: 1000 });
      expect(observability.metrics.getCounter(MetricNames.RATE_LIMITS_HIT)).toBe(1);
    });

    it('retries server errors', async () => {
      const client = createClient({ retryConfig: { maxRetries: 1, initialBackoffMs: 1, jitterFactor: 0 } });
      fake.respondNext(503, { error: { type: 'SERVICE_UNAVAILABLE', message: 'Try again' } });
      fake.addBase({ id: 'appA', name: 'Alpha', permissionLevel: 'create' });

      await expect(client.bases()).resolves.toEqual([{ id: 'appA', name: 'Alpha', permissionLevel: 'create' }]);
      expect(fake.requests).toHaveLength(2);
    });

    it('does not resend a create after a server error', async () => {
      const client = createClient({ retryConfig: { maxRetries: 2, initialBackoffMs: 1, jitterFactor: 0 } });
      let failed = false;
      vi.stubGlobal(
        'fetch',
        vi.fn(async (input: string, init?: RequestInit) => {
          const response = await fake.fetch(input, init);
          if (init?.method === 'POST' && !failed) {
            failed = true;
            return new Response(JSON.stringify({ error: { type: 'BAD_GATEWAY', message: 'Bad gateway' } }), {
              status: 502,
            });
          }
          return response;
        })
      );

      await expect(client.table('appA', 'Tasks').create({ Name: 'Once' })).rejects.toBeInstanceOf(ServerError);
      expect(fake.requests).toHaveLength(1);
      expect(fake.recordsIn('appA', 'Tasks')).toHaveLength(1);
    });

    it('still retries a rate-limited create', async () => {
      const client = createClient({ retryConfig: { maxRateLimitRetries: 1, initialBackoffMs: 1, jitterFactor: 0 } });
      fake.respondNext(429, { errors: [{ error: 'RATE_LIMIT_REACHED' }] }, { 'retry-after': '0' });

      const record = await client.table('appA', 'Tasks').create({ Name: 'Once' });

      expect(record.fields).toEqual({ Name: 'Once' });
      expect(fake.requests.map(r => r.method)).toEqual(['POST', 'POST']);
      expect(fake.recordsIn('appA', 'Tasks')).toHaveLength(1);
    });

    it('retries updates after a server error', async () => {
      const seeded = fake.seed('appA', 'Tasks', { Name: 'Old' });
      const client = createClient({ retryConfig: { maxRetries: 1, initialBackoffMs: 1, jitterFactor: 0 } });
      fake.respondNext(502, { error: { type: 'BAD_GATEWAY', message: 'Bad gateway' } });

      const record = await client.table('appA', 'Tasks').update(seeded.id, { Name: 'New' });

      expect(record.fields).toEqual({ Name: 'New' });
      expect(fake.requests).toHaveLength(2);
    });

    it('gives up on server errors without retries', async () => {
      const client = createClient();
      fake.respondNext(500, { error: { type: 'SERVER_ERROR', message: 'Boom' } });

      await expect(client.bases()).rejects.toBeInstanceOf(ServerError);
    });

    it('wraps fetch failures in NetworkError', async () => {
      vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')));
      const client = createClient();

      await expect(client.bases()).rejects.toThrow('Network error: fetch failed');
      await expect(client.bases()).rejects.toBeInstanceOf(NetworkError);
    });

    it('turns aborts into TimeoutError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(
          (_input: string, init?: RequestInit) =>
            new Promise<Response>((_resolve, reject) => {
              init?.signal?.addEventListener('abort', () => {
                reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
              });
            })
        )
      );
      const client = createClient({ requestTimeoutMs: 20 });

      await expect(client.bases()).rejects.toBeInstanceOf(TimeoutError);
    });
  });

  describe('metadata', () => {
    it('follows base pagination', async () => {
      fake.basesPageSize = 2;
      fake
        .addBase({ id: 'appA', name: 'Alpha', permissionLevel: 'create' })
        .addBase({ id: 'appB', name: 'Beta', permissionLevel: 'read' })
        .addBase({ id: 'appC', name: 'Gamma', permissionLevel: 'edit' });
      const client = createClient();

      const bases = await client.bases();

      expect(bases.map(b => b.id)).toEqual(['appA', 'appB', 'appC']);
      expect(fake.requests).toHaveLength(2);
      expect(fake.requests[1]?.url.searchParams.get('offset')).toBe('2');
    });

    it('lists tables and finds a schema by name', async () => {
      fake.addBase({ id: 'appA', name: 'Alpha', permissionLevel: 'create' }, [
        {
          id: 'tblTasks',
          name: 'Tasks',
          primaryFieldId: 'fldName',
          fields: [{ id: 'fldName', name: 'Name', type: 'singleLineText' }],
          views: [{ id: 'viwGrid', name: 'Grid view', type: 'grid' }],
        },
      ]);
      const client = createClient();

      const tables = await client.base('appA').tables();
      expect(tables.map(t => t.id)).toEqual(['tblTasks']);
      expect(fake.requests[0]?.path).toBe('/meta/bases/appA/tables');

      const schema = await client.table('appA', 'Tasks').schema();
      expect(schema.primaryFieldId).toBe('fldName');
    });

    it('reports a missing table schema', async () => {
      fake.addBase({ id: 'appA', name: 'Alpha', permissionLevel: 'create' });
      const client = createClient();

      await expect(client.base('appA').table('Nope').schema()).rejects.toThrow(
        'Resource not found: table Nope in base appA'
      );
    });
  });
});
