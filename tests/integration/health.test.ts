/**
 * Integration tests for the health routes
 */

import { afterEach, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';

import {
  makeFailingHealthChecker,
  makeHealthChecker,
  makeTestConfig,
  makeTestLogger,
} from '../fixtures/builders.js';
import { makeFakeVotesSource } from '../fixtures/fakes.js';

import type { HealthChecker } from '@/modules/health/index.js';
import type { FastifyInstance } from 'fastify';

describe('Health routes', () => {
  let app: FastifyInstance;

  const buildApp = async (healthCheckers: HealthChecker[] = [], version?: string) => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        logger: makeTestLogger(),
        votesSource: makeFakeVotesSource([]),
        healthCheckers,
      },
      version,
    });
    return app;
  };

  afterEach(async () => {
    await app.close();
  });

  it('GET /health/live answers without running checkers', async () => {
    let calls = 0;
    await buildApp([
      async () => {
        calls++;
        return { name: 'database', status: 'healthy' };
      },
    ]);

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
    expect(calls).toBe(0);
  });

  it('GET /health/ready reports ok when every check passes', async () => {
    await buildApp(
      [
        makeHealthChecker({ name: 'database', status: 'healthy', critical: true }),
        makeHealthChecker({ name: 'election-data', status: 'healthy', critical: false }),
      ],
      '0.1.0'
    );

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ok');
    expect(body.version).toBe('0.1.0');
    expect(body.checks.map((check: { name: string }) => check.name)).toEqual([
      'database',
      'election-data',
    ]);
  });

  it('GET /health/ready reports degraded with 200 when election data is missing', async () => {
    await buildApp([
      makeHealthChecker({ name: 'database', status: 'healthy', critical: true }),
      makeHealthChecker({
        name: 'election-data',
        status: 'unhealthy',
        message: 'No election data published',
        critical: false,
      }),
    ]);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('degraded');
  });

  it('GET /health/ready reports unhealthy with 503 when the database is down', async () => {
    await buildApp([
      makeHealthChecker({
        name: 'database',
        status: 'unhealthy',
        message: 'connection refused',
        critical: true,
      }),
    ]);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    const body = response.json();
    expect(body.status).toBe('unhealthy');
    expect(body.checks[0].message).toBe('connection refused');
  });

  it('GET /health/ready treats a throwing checker as a critical failure', async () => {
    await buildApp([makeFailingHealthChecker('checker exploded')]);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().checks).toEqual([
      { name: 'unknown', status: 'unhealthy', message: 'checker exploded', critical: true },
    ]);
  });
});
