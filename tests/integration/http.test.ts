import type { Server } from 'http';
import axios, { AxiosInstance } from 'axios';
import { afterEach, describe, expect, it } from 'vitest';
import { Application, buildApplication } from '../../src/container';
import { CrawlError } from '../../src/errors/crawl-error';
import { CrawlerRegistry } from '../../src/services/crawlerRegistry.service';
import { parseConfig } from '../../src/utils/config';
import { ControlledCrawler, flush, StubCrawler } from '../helpers/crawlers';

interface Running {
  http: AxiosInstance;
  application: Application;
  slow: ControlledCrawler;
  server: Server;
}

let running: Running | undefined;

async function start(env: NodeJS.ProcessEnv = {}): Promise<Running> {
  const slow = new ControlledCrawler();
  const registry = new CrawlerRegistry()
    .register('fake-ok', new StubCrawler(async () => ({ rows: 42 }), 'Always yields 42 rows'))
    .register(
      'fake-fail',
      new StubCrawler(async () => {
        throw new CrawlError('network', 'connect ECONNREFUSED 127.0.0.1:9');
      }),
    )
    .register('slow', slow);

  const application = buildApplication(parseConfig(env), { registry });
  const server = await new Promise<Server>((resolve) => {
    const listening = application.app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;

  running = {
    application,
    slow,
    server,
    http: axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true }),
  };
  return running;
}

afterEach(async () => {
  if (!running) return;
  const { server, application, slow } = running;
  running = undefined;

  await flush();
  for (const run of slow.runs) {
    run.deferred.resolve({});
  }
  await application.executor.drain();
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  application.store.close();
});

describe('HTTP API', () => {
  it('reports health and identity', async () => {
    const { http } = await start();

    const health = await http.get('/health');
    expect(health.status).toBe(200);
    expect(health.data).toMatchObject({ status: 'healthy', app: 'Market Crawl Orchestrator', version: '1.0.0' });
    expect(typeof health.data.uptime).toBe('number');

    const root = await http.get('/');
    expect(root.data).toEqual({ app: 'Market Crawl Orchestrator', version: '1.0.0', status: 'running' });
  });

  it('lists registered crawlers with executor stats', async () => {
    const { http } = await start();

    const response = await http.get('/api/v1/crawlers/');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      names: ['fake-fail', 'fake-ok', 'slow'],
      crawlers: [
        { name: 'fake-fail', description: null },
        { name: 'fake-ok', description: 'Always yields 42 rows' },
        { name: 'slow', description: 'Crawler driven by the test' },
      ],
      executor: { active: 0, queued: 0, concurrency: 2, queuePolicy: 'queue', maxQueueSize: 50 },
    });
  });

  it('runs an accepted crawl to success', async () => {
    const { http, application } = await start();

    const accepted = await http.post('/api/v1/crawlers/fake-ok/crawl', { target: 'alpha' });

    expect(accepted.status).toBe(202);
    expect(accepted.data).toMatchObject({
      success: true,
      status: 'running',
      crawlerType: 'fake-ok',
      target: 'alpha',
      message: 'Crawl task accepted',
    });
    const { taskId } = accepted.data;
    expect(accepted.headers.location).toBe(`/api/v1/crawlers/tasks/${taskId}`);

    await application.executor.drain();
    const status = await http.get(`/api/v1/crawlers/tasks/${taskId}`);

    expect(status.status).toBe(200);
    expect(status.data).toMatchObject({
      id: taskId,
      crawlerType: 'fake-ok',
      target: 'alpha',
      status: 'succeeded',
      progress: 100,
      currentStep: 'Completed',
      resultSummary: { rows: 42 },
      error: null,
    });
    expect(status.data.startedAt).toEqual(expect.any(String));
    expect(status.data.completedAt).toEqual(expect.any(String));
    expect(status.data.executionTimeMs).toBeGreaterThanOrEqual(0);
  });

  it('runs a replaced krx crawler end to end', async () => {
    const { http, application } = await start();
    application.registry.register(
      'krx',
      new StubCrawler(async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return { rows: 42 };
      }),
    );

    const accepted = await http.post('/api/v1/crawlers/krx/crawl', { target: '2024-08-01' });
    expect(accepted.status).toBe(202);
    expect(['pending', 'running']).toContain(accepted.data.status);

    await application.executor.drain();
    const status = await http.get(`/api/v1/crawlers/tasks/${accepted.data.taskId}`);

    expect(status.data).toMatchObject({ status: 'succeeded', target: '2024-08-01', resultSummary: { rows: 42 } });
  });

  it('records crawler failures on the task', async () => {
    const { http, application } = await start();

    const accepted = await http.post('/api/v1/crawlers/fake-fail/crawl', { target: 'alpha' });
    await application.executor.drain();
    const status = await http.get(`/api/v1/crawlers/tasks/${accepted.data.taskId}`);

    expect(status.data).toMatchObject({
      status: 'failed',
      resultSummary: null,
      error: { kind: 'network', message: 'connect ECONNREFUSED 127.0.0.1:9' },
    });
    expect(status.data.completedAt).toEqual(expect.any(String));
  });

  it('accepts one of two concurrent requests for the same target', async () => {
    const { http, slow } = await start();

    const responses = await Promise.all([
      http.post('/api/v1/crawlers/slow/crawl', { target: '2024-08-01' }),
      http.post('/api/v1/crawlers/slow/crawl', { target: '2024-08-01' }),
    ]);
    const accepted = responses.find((response) => response.status === 202);
    const conflict = responses.find((response) => response.status === 409);

    expect(responses.map((response) => response.status).sort()).toEqual([202, 409]);
    expect(conflict?.data).toEqual({
      success: false,
      error: 'A crawl for this target is already in progress',
      taskId: accepted?.data.taskId,
      crawlerType: 'slow',
      target: '2024-08-01',
    });

    await flush();
    expect(slow.runs).toHaveLength(1);

    const tasks = await http.get('/api/v1/crawlers/slow/tasks');
    expect(tasks.data.total).toBe(1);
  });

  it('rejects unknown crawler types without creating a task', async () => {
    const { http } = await start();

    const response = await http.post('/api/v1/crawlers/nonexistent/crawl', { target: 'alpha' });

    expect(response.status).toBe(404);
    expect(response.data).toEqual({
      success: false,
      error: "Unknown crawler type 'nonexistent'",
      supportedCrawlers: ['fake-fail', 'fake-ok', 'slow'],
    });
    expect((await http.get('/api/v1/crawlers/tasks')).data).toEqual({ tasks: [], total: 0 });
    expect((await http.get('/api/v1/crawlers/nonexistent/tasks')).status).toBe(404);
  });

  it('returns 404 for unknown task ids', async () => {
    const { http } = await start();

    const response = await http.get('/api/v1/crawlers/tasks/no-such-task');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ success: false, error: "Task 'no-such-task' not found" });
  });

  it('validates bodies, targets and query parameters', async () => {
    const { http } = await start();

    const wrongType = await http.post('/api/v1/crawlers/fake-ok/crawl', { target: 20240801 });
    expect(wrongType.status).toBe(400);
    expect(wrongType.data).toMatchObject({ success: false, error: 'Invalid request payload' });

    const missing = await http.post('/api/v1/crawlers/fake-ok/crawl', {});
    expect(missing.status).toBe(400);
    expect(missing.data).toEqual({ success: false, error: 'A target is required for this crawler' });

    const malformed = await http.post('/api/v1/crawlers/fake-ok/crawl', '{"target":', {
      headers: { 'Content-Type': 'application/json' },
    });
    expect(malformed.status).toBe(400);
    expect(malformed.data).toEqual({ success: false, error: 'Invalid request body' });

    const badLimit = await http.get('/api/v1/crawlers/tasks', { params: { limit: 0 } });
    expect(badLimit.status).toBe(400);

    const badStatus = await http.get('/api/v1/crawlers/fake-ok/tasks', { params: { status: 'done' } });
    expect(badStatus.status).toBe(400);
  });

  it('filters task listings', async () => {
    const { http, application } = await start();

    await http.post('/api/v1/crawlers/fake-ok/crawl', { target: 'a' });
    await http.post('/api/v1/crawlers/fake-fail/crawl', { target: 'a' });
    await application.executor.drain();
    await http.post('/api/v1/crawlers/slow/crawl', { target: 'a' });

    const all = await http.get('/api/v1/crawlers/tasks');
    expect(all.data.total).toBe(3);

    const failed = await http.get('/api/v1/crawlers/tasks', { params: { status: 'failed' } });
    expect(failed.data.tasks.map((task: { crawlerType: string }) => task.crawlerType)).toEqual(['fake-fail']);

    const limited = await http.get('/api/v1/crawlers/tasks', { params: { limit: 1 } });
    expect(limited.data.tasks.map((task: { crawlerType: string }) => task.crawlerType)).toEqual(['slow']);
    expect(limited.data.total).toBe(3);

    const okOnly = await http.get('/api/v1/crawlers/fake-ok/tasks', { params: { status: 'succeeded' } });
    expect(okOnly.data).toMatchObject({ total: 1, tasks: [{ crawlerType: 'fake-ok', status: 'succeeded' }] });
  });

  it('answers 503 when the pool is full under the reject policy', async () => {
    const { http } = await start({ CRAWL_CONCURRENCY: '1', CRAWL_QUEUE_POLICY: 'reject' });

    expect((await http.post('/api/v1/crawlers/slow/crawl', { target: 'a' })).status).toBe(202);
    const rejected = await http.post('/api/v1/crawlers/slow/crawl', { target: 'b' });

    expect(rejected.status).toBe(503);
    expect(rejected.data).toEqual({
      success: false,
      error: 'Crawl capacity exceeded, retry later',
      active: 1,
      queued: 0,
    });
    expect((await http.get('/api/v1/crawlers/slow/tasks')).data.total).toBe(1);
  });
});
