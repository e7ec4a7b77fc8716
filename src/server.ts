import Fastify from 'fastify';
import type { Database as DatabaseType } from 'better-sqlite3';
import { config } from './config/env.js';
import type { ReplyLedger } from './db/reply-ledger.js';
import type { CycleRunner } from './jobs/cycle-runner.js';
import type { ScheduleOptions } from './jobs/scheduler.js';
import { healthRoutes } from './routes/health.js';
import { triggerRoutes } from './routes/trigger.js';
import { statusRoutes } from './routes/status.js';
import { reviewRoutes } from './routes/reviews.js';
import type { PreviewReport } from './workflows/review-preview.js';
import { globalErrorHandler } from './middleware/error-handler.js';

export interface ServerDeps {
  sqlite: DatabaseType;
  runner: CycleRunner;
  ledger: Pick<ReplyLedger, 'stats'>;
  schedule: ScheduleOptions;
  preview: () => Promise<PreviewReport>;
  triggerToken?: string;
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
      ...(config.NODE_ENV === 'development'
        ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
        : {}),
    },
  });

  app.setErrorHandler(globalErrorHandler);

  // Routes
  await app.register(healthRoutes, { sqlite: deps.sqlite });
  await app.register(triggerRoutes, { runner: deps.runner, token: deps.triggerToken });
  await app.register(statusRoutes, {
    runner: deps.runner,
    ledger: deps.ledger,
    schedule: deps.schedule,
  });
  await app.register(reviewRoutes, {
    runner: deps.runner,
    preview: deps.preview,
    token: deps.triggerToken,
  });

  return app;
}
