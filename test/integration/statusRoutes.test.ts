import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';

import { buildApp } from '../../src/app.js';
import { loadConfig } from '../../src/config.js';
import { silentLogger } from '../../src/logger.js';
import type { RunReport } from '../../src/run.js';
import { createRunTrigger } from '../../src/scheduler.js';

const report: RunReport = {
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:02.000Z',
  denied: { count: 2, refreshed: true, stale: false },
  allowedCount: 0,
  devices: [{ device: 'a', host: '10.0.0.1', status: 'connection-failed', error: 'Cannot connect to a (10.0.0.1): TIMEOUT' }]
};

describe('integration: status API', () => {
  let app: FastifyInstance | null = null;
  let release: () => void = () => undefined;

  afterEach(async () => {
    release();
    await app?.close();
    app = null;
  });

  async function start(adminToken: string) {
    const runs = createRunTrigger(
      () =>
        new Promise<RunReport>((resolve) => {
          release = () => resolve(report);
        }),
      silentLogger()
    );
    app = await buildApp(loadConfig({ NODE_ENV: 'test', REDIRECT_TO_IP: '0.0.0.0', ADMIN_TOKEN: adminToken }), runs);
    return { app, runs };
  }

  it('answers the health check', async () => {
    const { app } = await start('');
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: true,
      running: false,
      dryRun: false,
      devices: 0,
      lastRun: null,
      lastError: null
    });
  });

  it('reports a failed run in the health check', async () => {
    const runs = createRunTrigger(async () => {
      throw new Error('Source list /etc/gateway-adblock/sources.txt has no blocklist URLs');
    }, silentLogger());
    app = await buildApp(loadConfig({ NODE_ENV: 'test', REDIRECT_TO_IP: '0.0.0.0', GATEWAY_HOME: 'admin/test-secret@10.0.0.1' }), runs);
    await runs.trigger().done;

    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      ok: false,
      devices: 1,
      lastRun: null,
      lastError: 'Source list /etc/gateway-adblock/sources.txt has no blocklist URLs'
    });
  });

  it('returns 404 before the first run', async () => {
    const { app } = await start('');
    const res = await app.inject({ method: 'GET', url: '/api/runs/last' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'NO_RUN_YET', running: false });
  });

  it('does not expose manual runs without an admin token', async () => {
    const { app } = await start('');
    const res = await app.inject({ method: 'POST', url: '/api/runs' });
    expect(res.statusCode).toBe(404);
  });

  it('starts a run for the admin and reports it', async () => {
    const { app, runs } = await start('test-secret');

    const denied = await app.inject({ method: 'POST', url: '/api/runs', headers: { authorization: 'Bearer nope' } });
    expect(denied.statusCode).toBe(401);

    const auth = { authorization: 'Bearer test-secret' };
    const started = await app.inject({ method: 'POST', url: '/api/runs', headers: auth });
    expect(started.statusCode).toBe(202);
    expect(started.json()).toEqual({ ok: true });

    const busy = await app.inject({ method: 'POST', url: '/api/runs', headers: auth });
    expect(busy.statusCode).toBe(409);
    expect(busy.json()).toEqual({ error: 'RUN_IN_PROGRESS' });

    release();
    await runs.whenIdle();

    const last = await app.inject({ method: 'GET', url: '/api/runs/last' });
    expect(last.statusCode).toBe(200);
    expect(last.headers['cache-control']).toBe('no-store');
    expect(last.json()).toEqual({ running: false, report, error: null });

    const health = await app.inject({ method: 'GET', url: '/api/health' });
    expect(health.json()).toMatchObject({
      ok: true,
      lastRun: { finishedAt: '2026-01-01T00:00:02.000Z', deniedCount: 2, deniedStale: false, skippedDevices: 1 }
    });
  });
});
