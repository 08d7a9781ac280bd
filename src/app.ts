import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';

import type { AppConfig } from './config.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerRunsRoutes } from './routes/runs.js';
import type { RunTrigger } from './scheduler.js';

export async function buildApp(config: AppConfig, runs: RunTrigger) {
  const app = Fastify({
    logger:
      config.NODE_ENV === 'test'
        ? false
        : {
            level: config.LOG_LEVEL,
            ...(config.LOG_PRETTY ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {})
          }
  });

  await app.register(helmet, { global: true, contentSecurityPolicy: false });
  await app.register(rateLimit, {
    global: false,
    max: 60,
    timeWindow: '1 minute'
  });

  await registerHealthRoutes(app, config, runs);
  await registerRunsRoutes(app, config, runs);

  await app.ready();
  return app;
}
