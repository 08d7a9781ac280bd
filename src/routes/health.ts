import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { RunTrigger } from '../scheduler.js';

/** Liveness plus a one-line view of the scheduler; `ok` turns false after a failed run. */
export async function registerHealthRoutes(app: FastifyInstance, config: AppConfig, runs: RunTrigger): Promise<void> {
  app.get('/api/health', async () => {
    const state = runs.state();
    const report = state.lastReport;
    return {
      ok: state.lastError === null,
      running: state.running,
      dryRun: config.DRY_RUN,
      devices: config.devices.length,
      lastRun: report
        ? {
            finishedAt: report.finishedAt,
            deniedCount: report.denied.count,
            deniedStale: report.denied.stale,
            skippedDevices: report.devices.filter((d) => d.status === 'connection-failed' || d.status === 'snapshot-failed')
              .length
          }
        : null,
      lastError: state.lastError?.message ?? null,
      time: new Date().toISOString()
    };
  });
}
