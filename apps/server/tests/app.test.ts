import { describe, it, expect } from 'vitest';
import { closeDb } from '@tasktrack/core';
import { FailingBackend } from './failing-backend.js';
import { START, createTestApp, readJsonBody } from './helpers.js';

const CREATED_AT = '2025-03-10T12:00:10.000Z';

describe('health probes', () => {
  it('answers liveness at the root and under the prefix', async () => {
    const { request } = createTestApp();
    for (const path of ['/health', '/api/health']) {
      const response = await request('GET', path);
      expect(response.status).toBe(200);
      expect(await readJsonBody(response)).toEqual({ status: 'ok' });
    }
  });

  it('is ready when the store answers', async () => {
    const response = await createTestApp().request('GET', '/ready');
    expect(response.status).toBe(200);
    expect(await readJsonBody(response)).toMatchObject({
      status: 'ready',
      checks: { database: { status: 'pass' }, cache: { status: 'pass', message: 'memory' } },
    });
  });

  it('is not ready when a configured cache is unreachable', async () => {
    const response = await createTestApp({}, () => new FailingBackend()).request('GET', '/api/ready');
    expect(response.status).toBe(503);
    expect(await readJsonBody(response)).toMatchObject({
      status: 'not_ready',
      checks: {
        database: { status: 'pass' },
        cache: { status: 'fail', message: 'cache ping failed: connection refused' },
      },
    });
  });

  it('is ready with caching turned off', async () => {
    const response = await createTestApp({ CACHE_BACKEND: 'none' }, () => null).request('GET', '/ready');
    expect(response.status).toBe(200);
    expect(await readJsonBody(response)).toMatchObject({
      status: 'ready',
      checks: { cache: { status: 'pass', message: 'caching disabled' } },
    });
  });

  it('is not ready without the store', async () => {
    const { request, context } = createTestApp();
    closeDb(context.db);
    const response = await request('GET', '/ready');
    expect(response.status).toBe(503);
    expect(await readJsonBody(response)).toMatchObject({ status: 'not_ready', checks: { database: { status: 'fail' } } });
  });
});

describe('POST /api/tasks', () => {
  it('creates an incomplete task with defaults', async () => {
    const response = await createTestApp().request('POST', '/api/tasks', { body: { title: 'A', completed: true } });
    expect(response.status).toBe(201);
    expect(await readJsonBody(response)).toEqual({
      id: 1,
      title: 'A',
      description: null,
      priority: 1,
      completed: false,
      due_date: null,
      created_at: CREATED_AT,
      updated_at: CREATED_AT,
      completed_at: null,
    });
  });

  it('rejects an empty title with field details', async () => {
    const response = await createTestApp().request('POST', '/api/tasks', { body: { title: '' } });
    expect(response.status).toBe(400);
    expect(await readJsonBody(response)).toEqual({
      kind: 'VALIDATION_ERROR',
      message: 'Invalid task',
      details: [{ field: 'title', message: 'title must not be empty' }],
    });
  });

  it('rejects malformed JSON', async () => {
    const response = await createTestApp().request('POST', '/api/tasks', { raw: '{"title":' });
    expect(response.status).toBe(400);
    expect(await readJsonBody(response)).toEqual({
      kind: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
      details: [{ field: 'body', message: 'request body is not valid JSON' }],
    });
  });

  it('rejects an oversized body', async () => {
    const response = await createTestApp({ MAX_BODY_BYTES: '16' })
      .request('POST', '/api/tasks', { body: { title: 'a title that is far too long' } });
    expect(response.status).toBe(413);
    expect(await readJsonBody(response)).toEqual({ kind: 'PAYLOAD_TOO_LARGE', message: 'Request body exceeds 16 bytes' });
  });
});

describe('worked scenarios', () => {
  it('create, complete with PUT, then read stats after their TTL', async () => {
    const { request, clock } = createTestApp();

    const created = await request('POST', '/api/tasks', { body: { title: 'A' } });
    expect(created.status).toBe(201);
    expect(await readJsonBody(created)).toMatchObject({ priority: 1, completed: false });

    // Prime the stats cache so the TTL matters
    expect(await readJsonBody(await request('GET', '/api/stats'))).toMatchObject({ pending: 1 });

    clock.ms += 1000;
    const updated = await request('PUT', '/api/tasks/1', { body: { title: 'A', completed: true } });
    expect(updated.status).toBe(200);
    expect(await readJsonBody(updated)).toMatchObject({
      completed: true,
      completed_at: '2025-03-10T12:00:11.000Z',
      updated_at: '2025-03-10T12:00:11.000Z',
    });

    clock.ms += 30_000;
    const stats = await request('GET', '/api/stats');
    expect(stats.status).toBe(200);
    expect(await readJsonBody(stats)).toMatchObject({ total: 1, completed: 1, pending: 0, completionRate: 100 });
  });

  it('a batch with one invalid item persists nothing', async () => {
    const { request } = createTestApp();
    const before = await readJsonBody(await request('GET', '/api/tasks'));

    const response = await request('POST', '/api/tasks/batch', { body: { tasks: [{ title: 'ok' }, { title: '' }] } });
    expect(response.status).toBe(400);
    expect(await readJsonBody(response)).toEqual({
      kind: 'VALIDATION_ERROR',
      message: 'Invalid batch',
      details: [{ field: 'tasks.1.title', message: 'title must not be empty' }],
    });

    expect(await readJsonBody(await request('GET', '/api/tasks'))).toEqual(before);
    expect(before).toEqual([]);
  });
});

describe('task routes', () => {
  it('creates a batch from a bare array', async () => {
    const { request } = createTestApp();
    const response = await request('POST', '/api/tasks/batch', { body: [{ title: 'x' }, { title: 'y', priority: 3 }] });
    expect(response.status).toBe(201);
    const body = await readJsonBody(response);
    expect(body).toMatchObject([{ id: 1, title: 'x', priority: 1 }, { id: 2, title: 'y', priority: 3 }]);
  });

  it('lists with filters, newest first', async () => {
    const { request, clock } = createTestApp();
    await request('POST', '/api/tasks', { body: { title: 'Buy milk', priority: 2 } });
    clock.ms += 1000;
    await request('POST', '/api/tasks', { body: { title: 'Call plumber', description: 'about the MILK pipe' } });

    const all = await readJsonBody(await request('GET', '/api/tasks'));
    expect(all).toMatchObject([{ id: 2 }, { id: 1 }]);

    const milk = await readJsonBody(await request('GET', '/api/tasks?search=milk'));
    expect(milk).toMatchObject([{ id: 2 }, { id: 1 }]);

    const medium = await readJsonBody(await request('GET', '/api/tasks?priority=2'));
    expect(medium).toMatchObject([{ id: 1 }]);

    const paged = await readJsonBody(await request('GET', '/api/tasks?limit=1&offset=1'));
    expect(paged).toMatchObject([{ id: 1 }]);
  });

  it('matches accented titles regardless of case', async () => {
    const { request } = createTestApp();
    await request('POST', '/api/tasks', { body: { title: 'Éclair order' } });
    const found = await readJsonBody(await request('GET', '/api/tasks?search=%C3%A9clair'));
    expect(found).toMatchObject([{ id: 1, title: 'Éclair order' }]);
  });

  it('rejects invalid filter values', async () => {
    const { request } = createTestApp();
    const badFlag = await request('GET', '/api/tasks?completed=maybe');
    expect(badFlag.status).toBe(400);
    expect(await readJsonBody(badFlag)).toEqual({
      kind: 'VALIDATION_ERROR',
      message: 'Invalid filter',
      details: [{ field: 'completed', message: "completed must be 'true' or 'false'" }],
    });
    expect((await request('GET', '/api/tasks?priority=5')).status).toBe(400);
  });

  it('reads, patches, toggles and deletes a task', async () => {
    const { request } = createTestApp();
    await request('POST', '/api/tasks', { body: { title: 'Task', due_date: '2025-04-01' } });

    expect(await readJsonBody(await request('GET', '/api/tasks/1'))).toMatchObject({ title: 'Task', due_date: '2025-04-01' });

    const patched = await request('PATCH', '/api/tasks/1', { body: { priority: 3 } });
    expect(await readJsonBody(patched)).toMatchObject({ title: 'Task', priority: 3, due_date: '2025-04-01' });

    const toggled = await request('POST', '/api/tasks/1/toggle');
    expect(await readJsonBody(toggled)).toMatchObject({ completed: true, completed_at: CREATED_AT });

    const deleted = await request('DELETE', '/api/tasks/1');
    expect(deleted.status).toBe(204);
    expect(await deleted.text()).toBe('');

    const gone = await request('GET', '/api/tasks/1');
    expect(gone.status).toBe(404);
    expect(await readJsonBody(gone)).toEqual({ kind: 'NOT_FOUND', message: 'Task 1 not found' });
  });

  it('PUT resets omitted fields', async () => {
    const { request } = createTestApp();
    await request('POST', '/api/tasks', { body: { title: 'Task', description: 'details', priority: 3 } });
    const response = await request('PUT', '/api/tasks/1', { body: { title: 'Task' } });
    expect(await readJsonBody(response)).toMatchObject({ description: null, priority: 1, completed: false });
  });

  it('rejects an empty PATCH', async () => {
    const { request } = createTestApp();
    await request('POST', '/api/tasks', { body: { title: 'Task' } });
    const response = await request('PATCH', '/api/tasks/1', { body: {} });
    expect(response.status).toBe(400);
    expect(await readJsonBody(response)).toMatchObject({ kind: 'VALIDATION_ERROR', message: 'No fields to update' });
  });

  it('rejects a non-numeric id before touching the store', async () => {
    const response = await createTestApp().request('GET', '/api/tasks/abc');
    expect(response.status).toBe(400);
    expect(await readJsonBody(response)).toMatchObject({ details: [{ field: 'id', message: 'id must be a positive integer' }] });
  });

  it('404s a missing task on every mutation', async () => {
    const { request } = createTestApp();
    expect((await request('PUT', '/api/tasks/9', { body: { title: 'x' } })).status).toBe(404);
    expect((await request('PATCH', '/api/tasks/9', { body: { title: 'x' } })).status).toBe(404);
    expect((await request('POST', '/api/tasks/9/toggle')).status).toBe(404);
    expect((await request('DELETE', '/api/tasks/9')).status).toBe(404);
  });
});

describe('routing errors', () => {
  it('404s an unknown path', async () => {
    const response = await createTestApp().request('GET', '/api/nope');
    expect(response.status).toBe(404);
    expect(await readJsonBody(response)).toEqual({ kind: 'NOT_FOUND', message: 'No route for /api/nope' });
  });

  it('405s a known path with the wrong method', async () => {
    const response = await createTestApp().request('DELETE', '/api/tasks');
    expect(response.status).toBe(405);
    expect(response.headers.get('Allow')).toBe('GET, POST');
    expect(await readJsonBody(response)).toEqual({
      kind: 'METHOD_NOT_ALLOWED',
      message: 'Method DELETE is not allowed here',
    });
  });
});

describe('rate limiting', () => {
  it('rejects the request after the budget with a retry hint', async () => {
    const { request } = createTestApp({ RATE_LIMIT_TASKS_CREATE: '2' });
    expect((await request('POST', '/api/tasks', { body: { title: 'a' } })).status).toBe(201);
    const second = await request('POST', '/api/tasks', { body: { title: 'b' } });
    expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');

    const third = await request('POST', '/api/tasks', { body: { title: 'c' } });
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBe('50');
    expect(third.headers.get('X-RateLimit-Limit')).toBe('2');
    expect(third.headers.get('X-RateLimit-Reset')).toBe(String((START - 10_000 + 60_000) / 1000));
    expect(await readJsonBody(third)).toEqual({
      kind: 'RATE_LIMITED',
      message: 'Rate limit exceeded. Please try again later.',
    });
  });

  it('keeps separate budgets per client and per route', async () => {
    const { request } = createTestApp({ RATE_LIMIT_TASKS_CREATE: '1' });
    expect((await request('POST', '/api/tasks', { body: { title: 'a' }, ip: '10.0.0.1' })).status).toBe(201);
    expect((await request('POST', '/api/tasks', { body: { title: 'b' }, ip: '10.0.0.2' })).status).toBe(201);
    expect((await request('POST', '/api/tasks', { body: { title: 'c' }, ip: '10.0.0.1' })).status).toBe(429);
    expect((await request('GET', '/api/tasks', { ip: '10.0.0.1' })).status).toBe(200);
  });

  it('uses X-Forwarded-For only behind a trusted proxy', async () => {
    const trusted = createTestApp({ RATE_LIMIT_TASKS_CREATE: '1', TRUST_PROXY: 'true' });
    const post = (title: string, forwardedFor: string) =>
      trusted.request('POST', '/api/tasks', { body: { title }, headers: { 'X-Forwarded-For': `${forwardedFor}, 10.0.0.9` } });
    expect((await post('a', '203.0.113.1')).status).toBe(201);
    expect((await post('b', '203.0.113.2')).status).toBe(201);
    expect((await post('c', '203.0.113.1')).status).toBe(429);
  });

  it('admits requests when the limiter backend is down', async () => {
    const { request } = createTestApp({ RATE_LIMIT_TASKS_CREATE: '1' }, () => new FailingBackend());
    expect((await request('POST', '/api/tasks', { body: { title: 'a' } })).status).toBe(201);
    expect((await request('POST', '/api/tasks', { body: { title: 'b' } })).status).toBe(201);
  });
});

describe('cache bypass', () => {
  it('serves every route with caching off', async () => {
    const { request } = createTestApp({}, () => null);
    await request('POST', '/api/tasks', { body: { title: 'A' } });
    await request('POST', '/api/tasks/1/toggle');
    expect(await readJsonBody(await request('GET', '/api/tasks'))).toMatchObject([{ id: 1, completed: true }]);
    expect(await readJsonBody(await request('GET', '/api/stats'))).toMatchObject({ total: 1, completed: 1 });
  });

  it('serves fresh data when the cache is unreachable', async () => {
    // Readiness fails, but requests that do arrive still bypass the cache
    const { request } = createTestApp({}, () => new FailingBackend());
    await request('POST', '/api/tasks', { body: { title: 'A' } });
    await request('PATCH', '/api/tasks/1', { body: { title: 'B' } });
    expect(await readJsonBody(await request('GET', '/api/tasks/1'))).toMatchObject({ title: 'B' });
  });
});

describe('stats', () => {
  it('reports all three priorities for an empty store', async () => {
    const response = await createTestApp().request('GET', '/api/stats');
    expect(await readJsonBody(response)).toEqual({
      total: 0,
      completed: 0,
      pending: 0,
      completionRate: 0,
      priorityBreakdown: { 1: 0, 2: 0, 3: 0 },
      createdToday: 0,
      generatedAt: CREATED_AT,
    });
  });

  it('answers 200 with a degraded placeholder when the store fails', async () => {
    const { request, context } = createTestApp();
    closeDb(context.db);
    const response = await request('GET', '/api/stats');
    expect(response.status).toBe(200);
    expect(await readJsonBody(response)).toMatchObject({ total: 0, degraded: true });
  });
});

describe('CORS', () => {
  it('adds the allow-origin header for cross-origin requests', async () => {
    const response = await createTestApp().request('GET', '/api/tasks', { headers: { Origin: 'http://ui.example' } });
    expect(response.headers.get('Access-Control-Allow-Origin')).toBe('*');
  });

  it('answers preflight requests', async () => {
    const response = await createTestApp().request('OPTIONS', '/api/tasks/1', {
      headers: { Origin: 'http://ui.example', 'Access-Control-Request-Method': 'PUT' },
    });
    expect(response.status).toBe(204);
    expect(response.headers.get('Access-Control-Allow-Methods')).toBe('GET, POST, PUT, PATCH, DELETE');
  });

  it('echoes only configured origins', async () => {
    const app = createTestApp({ CORS_ORIGIN: 'http://ui.example, http://admin.example' });
    const allowed = await app.request('GET', '/health', { headers: { Origin: 'http://admin.example' } });
    const denied = await app.request('GET', '/health', { headers: { Origin: 'http://evil.example' } });
    expect(allowed.headers.get('Access-Control-Allow-Origin')).toBe('http://admin.example');
    expect(denied.headers.get('Access-Control-Allow-Origin')).toBeNull();
  });
});

describe('metrics', () => {
  it('exposes request counts per route at /metrics', async () => {
    const { request } = createTestApp();
    await request('POST', '/api/tasks', { body: { title: 'A' } });
    await request('GET', '/api/tasks');
    await request('GET', '/api/nope');

    const response = await request('GET', '/metrics');
    expect(response.status).toBe(200);
    expect(response.headers.get('Content-Type')).toBe('text/plain; version=0.0.4; charset=utf-8');

    const lines = (await response.text()).split('\n');
    expect(lines).toContain('http_requests_total{method="POST",route="tasks.create",status="201"} 1');
    expect(lines).toContain('http_requests_total{method="GET",route="tasks.list",status="200"} 1');
    expect(lines).toContain('http_requests_total{method="GET",route="unmatched",status="404"} 1');
    expect(lines).toContain('http_request_duration_seconds_count{method="POST",route="tasks.create",status="201"} 1');
    expect(lines).toContain('app_info{version="1.0.0"} 1');
  });

  it('keeps a separate registry per app', async () => {
    await createTestApp().request('GET', '/api/tasks');
    const text = await (await createTestApp().request('GET', '/metrics')).text();
    expect(text.split('\n')).not.toContain('http_requests_total{method="GET",route="tasks.list",status="200"} 1');
  });

  it('is not mounted when disabled', async () => {
    const response = await createTestApp({ METRICS_ENABLED: 'false' }).request('GET', '/metrics');
    expect(response.status).toBe(404);
  });
});
