import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import express, { type Express, type Request, type Response } from 'express';
import request from 'supertest';
import { HttpInstrumentation } from '../../../src/infrastructure/httpInstrumentation';
import { MetricsRegistry, type LabelRecord } from '../../../src/infrastructure/metrics';
import { RouteMatcher, type RouteDefinition } from '../../../src/infrastructure/routeMatcher';
import { createHttpMetricsMiddleware } from '../../../src/middleware/httpMetrics';
import { mountRoutes } from '../../../src/routes';
import {
  abortedGet,
  buildTestApp,
  deferred,
  httpMetricsOf,
  listen,
  silentLogger,
  type RunningServer,
} from '../../helpers/app';

describe('HTTP metrics middleware', () => {
  let registry: MetricsRegistry;
  let instrumentation: HttpInstrumentation;
  let running: RunningServer;
  let entered: ReturnType<typeof deferred<void>>;
  let release: ReturnType<typeof deferred<void>>;

  function buildApp(): Express {
    const routes: RouteDefinition[] = [
      {
        method: 'get',
        path: '/hold',
        handlers: [
          async (_req: Request, res: Response) => {
            entered.resolve();
            await release.promise;
            if (!res.destroyed) {
              res.json({ ok: true });
            }
          },
        ],
      },
      {
        method: 'get',
        path: '/items/:itemId',
        handlers: [(req: Request, res: Response) => void res.json({ id: req.params.itemId })],
      },
      {
        method: 'get',
        path: '/broken',
        handlers: [
          () => {
            throw new RangeError('out of range');
          },
        ],
      },
    ];

    const httpMetrics = createHttpMetricsMiddleware({
      instrumentation,
      routeMatcher: new RouteMatcher(routes),
    });

    const app = express();
    app.get('/metrics', (_req, res) => void res.send('ok'));
    app.use(httpMetrics.middleware);
    mountRoutes(app, routes);
    app.use(httpMetrics.errorObserver);
    return app;
  }

  beforeEach(async () => {
    registry = new MetricsRegistry({ logger: silentLogger() });
    instrumentation = new HttpInstrumentation(registry, { logger: silentLogger() });
    entered = deferred();
    release = deferred();
    running = await listen(buildApp());
  });

  afterEach(async () => {
    release.resolve();
    await running.close();
  });

  it('returns the in-progress gauge to zero after concurrent requests', async () => {
    const { requestsInProgress, requestsTotal } = instrumentation.metrics;
    const labels = { method: 'GET', route: '/hold' };

    const pending = Promise.all(
      Array.from({ length: 5 }, () => request(running.server).get('/hold').then((response) => response.status)),
    );
    await vi.waitFor(() => expect(registry.getSampleValue(requestsInProgress, labels)).toBe(5));

    release.resolve();
    expect(await pending).toEqual([200, 200, 200, 200, 200]);

    expect(registry.getSampleValue(requestsInProgress, labels)).toBe(0);
    expect(registry.getSampleValue(requestsTotal, { ...labels, status_code: '200' })).toBe(5);
  });

  it('labels concrete paths with their route template', async () => {
    for (const id of ['1', '2', '3']) {
      await request(running.server).get(`/items/${id}`).expect(200);
    }

    const family = registry.snapshot().find((candidate) => candidate.name === 'http_requests_total');
    expect(family?.samples).toEqual([
      { labels: { method: 'GET', route: '/items/{itemId}', status_code: '200' }, value: 3 },
    ]);
  });

  it('counts handler errors with the status the error produced', async () => {
    await request(running.server).get('/broken').expect(500);

    const { requestsTotal, requestErrors, requestsInProgress } = instrumentation.metrics;
    const labels = { method: 'GET', route: '/broken' };
    expect(registry.getSampleValue(requestsTotal, { ...labels, status_code: '500' })).toBe(1);
    expect(registry.getSampleValue(requestErrors, { ...labels, error_class: 'RangeError' })).toBe(1);
    expect(registry.getSampleValue(requestsInProgress, labels)).toBe(0);
  });

  it('records a request abandoned by the client as 499', async () => {
    await abortedGet(running.port, '/hold', entered.promise);

    const { requestsTotal, requestsInProgress } = instrumentation.metrics;
    const labels = { method: 'GET', route: '/hold' };
    await vi.waitFor(() =>
      expect(registry.getSampleValue(requestsTotal, { ...labels, status_code: '499' })).toBe(1),
    );
    expect(registry.getSampleValue(requestsInProgress, labels)).toBe(0);

    release.resolve();
    await request(running.server).get('/items/1').expect(200);
    expect(registry.getSampleValue(requestsTotal, { ...labels, status_code: '200' })).toBeUndefined();
  });

  it('uses the unmatched label for undeclared paths', async () => {
    await request(running.server).get('/does/not/exist').expect(404);

    const { requestsTotal, requestErrors } = instrumentation.metrics;
    expect(registry.getSampleValue(requestsTotal, { method: 'GET', route: 'unmatched', status_code: '404' })).toBe(1);
    expect(
      registry.getSampleValue(requestErrors, { method: 'GET', route: 'unmatched', error_class: 'Error' }),
    ).toBeUndefined();
  });

  it('does not instrument routes mounted ahead of it', async () => {
    await request(running.server).get('/metrics').expect(200);
    await request(running.server).get('/metrics/').expect(200);
    await request(running.server).get('/METRICS').expect(200);

    const labelSets = registry
      .snapshot()
      .flatMap((family): LabelRecord[] =>
        family.kind === 'histogram'
          ? family.samples.map((sample) => sample.labels)
          : family.samples.map((sample) => sample.labels),
      );
    expect(labelSets).toEqual([]);
  });
});

describe('HTTP metrics in the assembled app', () => {
  it('counts every request exactly once', async () => {
    const built = buildTestApp();
    const { requestsTotal } = httpMetricsOf(built);

    await Promise.all([
      request(built.app).get('/api/v1/users').expect(200),
      request(built.app).get('/api/v1/users/1').expect(200),
      request(built.app).get('/api/v1/users/99').expect(404),
      request(built.app).get('/api/v1/missing').expect(404),
    ]);

    const family = built.registry.snapshot().find((candidate) => candidate.name === requestsTotal.name);
    const samples = family?.kind === 'counter' ? family.samples : [];
    const total = samples.reduce((sum, sample) => sum + sample.value, 0);
    expect(total).toBe(4);
  });

  it('labels service errors with their status and class', async () => {
    const built = buildTestApp();
    const { requestsTotal, requestErrors } = httpMetricsOf(built);
    const labels = { method: 'GET', route: '/api/v1/users/{userId}' };

    await request(built.app).get('/api/v1/users/99').expect(404);

    expect(built.registry.getSampleValue(requestsTotal, { ...labels, status_code: '404' })).toBe(1);
    expect(built.registry.getSampleValue(requestErrors, { ...labels, error_class: 'AppError' })).toBe(1);
  });

  it('observes request body size and parse failures', async () => {
    const built = buildTestApp();
    const { requestsTotal, requestErrors } = httpMetricsOf(built);
    const labels = { method: 'POST', route: '/api/v1/users' };

    await request(built.app)
      .post('/api/v1/users')
      .send({ name: 'Dora', email: 'dora@example.com' })
      .expect(201);
    await request(built.app)
      .post('/api/v1/users')
      .set('Content-Type', 'application/json')
      .send('{"name":')
      .expect(400);

    expect(built.registry.getSampleValue(requestsTotal, { ...labels, status_code: '201' })).toBe(1);
    expect(built.registry.getSampleValue(requestsTotal, { ...labels, status_code: '400' })).toBe(1);
    expect(built.registry.getSampleValue(requestErrors, { ...labels, error_class: 'SyntaxError' })).toBe(1);

    const sizes = built.registry.snapshot().find((candidate) => candidate.name === 'http_request_size_bytes');
    const posted = sizes?.kind === 'histogram' ? sizes.samples.find((s) => s.labels.method === 'POST') : undefined;
    expect(posted?.count).toBe(2);
    expect(posted?.sum).toBe(42 + 8);
  });

  it('does not count validation failures as handler errors', async () => {
    const built = buildTestApp();
    const { requestsTotal, requestErrors } = httpMetricsOf(built);
    const labels = { method: 'POST', route: '/api/v1/users' };

    await request(built.app).post('/api/v1/users').send({ name: '', email: 'nope' }).expect(400);

    expect(built.registry.getSampleValue(requestsTotal, { ...labels, status_code: '400' })).toBe(1);
    const errors = built.registry.snapshot().find((candidate) => candidate.name === requestErrors.name);
    expect(errors?.samples).toEqual([]);
  });
});
