import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../src/server.js';
import { CatalogDiscovery } from '../src/services/catalog/discovery.js';
import { FakeIntrospector, storeSchema } from './fakes.js';
import { answering, buildRuntime, type TestRuntime } from './helpers.js';

const SQL = 'SELECT SUM(revenue) AS total_revenue FROM orders';
const NARRATIVE = 'Total revenue is 1,234.5.';

describe('HTTP API', () => {
  let app: FastifyInstance | undefined;

  async function start(parts: TestRuntime = buildRuntime([answering(SQL, NARRATIVE)], () => [{ total_revenue: 1234.5 }])) {
    app = await buildServer(parts.runtime, { docs: false, logger: false });
    return { app, ...parts };
  }

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('describes itself at the root', async () => {
    const { app } = await start();
    const response = await app.inject({ method: 'GET', url: '/' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ name: 'verisql API', docs: '/docs' });
  });

  it('answers POST /query', async () => {
    const { app } = await start();
    const response = await app.inject({
      method: 'POST',
      url: '/query',
      payload: { question: 'What is the total revenue?' },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'succeeded', query: SQL, narrative: NARRATIVE, attempts: 1 });
  });

  it('answers GET /query', async () => {
    const { app } = await start();
    const response = await app.inject({ method: 'GET', url: '/query?q=What%20is%20the%20total%20revenue%3F' });
    expect(response.json()).toMatchObject({ status: 'succeeded', question: 'What is the total revenue?' });
  });

  it('returns failed pipeline outcomes as data', async () => {
    const { app } = await start(buildRuntime(['DELETE FROM orders']));
    const response = await app.inject({ method: 'POST', url: '/query', payload: { question: 'delete from orders' } });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'failed', code: 'ForbiddenOperation' });
  });

  it('validates the request body', async () => {
    const { app } = await start();

    const missing = await app.inject({ method: 'POST', url: '/query', payload: {} });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toMatchObject({ error: 'ValidationError' });

    const tooLong = await app.inject({ method: 'POST', url: '/query', payload: { question: 'x'.repeat(201) } });
    expect(tooLong.statusCode).toBe(400);

    const blank = await app.inject({ method: 'POST', url: '/query', payload: { question: '   ' } });
    expect(blank.statusCode).toBe(400);
    expect(blank.json()).toMatchObject({ error: 'ValidationError' });
  });

  it('lists and fetches catalogs', async () => {
    const { app } = await start();

    const list = await app.inject({ method: 'GET', url: '/catalogs' });
    expect(list.json()).toEqual({
      catalogs: [{ id: 'shop', tables: 2, relationships: 1, refreshedAt: null }],
      total: 1,
    });

    const one = await app.inject({ method: 'GET', url: '/catalogs/shop' });
    expect(one.json()).toMatchObject({ id: 'shop' });

    const missing = await app.inject({ method: 'GET', url: '/catalogs/nope' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ error: 'NotFound', message: 'Catalog "nope" not found' });
  });

  it('publishes a catalog with PUT', async () => {
    const { app, store } = await start();

    const response = await app.inject({
      method: 'PUT',
      url: '/catalogs/extra',
      payload: { tables: [{ name: 't', alias: 'T', columns: [{ name: 'a' }] }] },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ id: 'extra', warnings: [], flushed: 0 });
    expect(await store.list()).toEqual(['extra', 'shop']);
  });

  it('rejects an inconsistent catalog', async () => {
    const { app } = await start();

    const response = await app.inject({
      method: 'PUT',
      url: '/catalogs/extra',
      payload: {
        tables: [{ name: 't', alias: 'T', columns: [{ name: 'a' }] }],
        relationships: [{ sourceTable: 't', targetTable: 'nope', joinKeys: [{ source: 'a', target: 'a' }] }],
      },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      error: 'CatalogError',
      issues: ['(root): Relationship t -> nope references unknown table nope'],
    });
  });

  it('refreshes a catalog from the database', async () => {
    const discovery = new CatalogDiscovery(new FakeIntrospector(storeSchema));
    const { app } = await start(buildRuntime([SQL], undefined, discovery));

    const response = await app.inject({ method: 'POST', url: '/catalogs/store/refresh' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ id: 'store', tables: 3, relationships: 2, warnings: [], flushed: 0 });
  });

  it('reports refresh without discovery as a client error', async () => {
    const { app } = await start();
    const response = await app.inject({ method: 'POST', url: '/catalogs/shop/refresh' });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'CatalogError', message: 'Schema discovery is not configured' });
  });

  it('exposes cache and request statistics', async () => {
    const { app } = await start();
    await app.inject({ method: 'POST', url: '/query', payload: { question: 'What is the total revenue?' } });

    const cache = await app.inject({ method: 'GET', url: '/cache/stats' });
    expect(cache.json()).toMatchObject({ backend: 'memory', size: 1 });

    const stats = await app.inject({ method: 'GET', url: '/stats?recent=5' });
    expect(stats.json()).toMatchObject({
      requests: { total: 1, succeeded: 1 },
      pool: { size: 2, available: 2 },
    });
    expect(stats.json().recent).toHaveLength(1);

    const flushed = await app.inject({ method: 'DELETE', url: '/cache' });
    expect(flushed.json()).toEqual({ flushed: 1 });
  });

  it('reports health', async () => {
    const parts = buildRuntime([SQL]);
    const { app } = await start(parts);

    const healthy = await app.inject({ method: 'GET', url: '/health' });
    expect(healthy.statusCode).toBe(200);
    expect(healthy.json()).toEqual({ status: 'ok', database: { dialect: 'better-sqlite3', ok: true }, cache: 'memory' });

    parts.dataSource.ping = async () => {
      throw new Error('connection refused');
    };
    const degraded = await app.inject({ method: 'GET', url: '/health' });
    expect(degraded.statusCode).toBe(503);
    expect(degraded.json()).toMatchObject({ status: 'degraded', database: { ok: false, error: 'connection refused' } });
  });

  it('closes the runtime with the server', async () => {
    const parts = buildRuntime([SQL]);
    const { app } = await start(parts);
    await app.close();
    expect(parts.dataSource.closed).toBe(true);
  });
});
