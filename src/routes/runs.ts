import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import { requireAdmin } from '../auth.js';
import type { RunTrigger } from '../scheduler.js';

export async function registerRunsRoutes(app: FastifyInstance, config: AppConfig, runs: RunTrigger): Promise<void> {
  app.get('/api/runs/last', async (_request, reply) => {
    const state = runs.state();
    if (!state.lastReport && !state.lastError) {
      reply.code(404);
      return { error: 'NO_RUN_YET', running: state.running };
    }
    reply.header('cache-control', 'no-store');
    return { running: state.running, report: state.lastReport, error: state.lastError };
  });

  // Without an admin token there is no way to authorize a manual run.
  if (!config.ADMIN_TOKEN.trim()) return;

  app.post(
    '/api/runs',
    {
      config: {
        rateLimit: {
          max: 6,
          timeWindow: '1 minute'
        }
      }
    },
    async (request, reply) => {
      requireAdmin(config, request);
      const { started } = runs.trigger();
      if (!started) {
        reply.code(409);
        return { error: 'RUN_IN_PROGRESS' };
      }
      reply.code(202);
      return { ok: true };
    }
  );
}
