import type { FastifyInstance } from 'fastify';
import type { CycleRunner } from '../jobs/cycle-runner.js';
import type { ReplyLedger } from '../db/reply-ledger.js';
import type { ScheduleOptions } from '../jobs/scheduler.js';

export interface StatusRouteOptions {
  runner: CycleRunner;
  ledger: Pick<ReplyLedger, 'stats'>;
  schedule: ScheduleOptions;
}

export async function statusRoutes(app: FastifyInstance, opts: StatusRouteOptions) {
  app.get('/status', async (_request, reply) => {
    return reply.send({
      runner: opts.runner.current,
      lastReport: opts.runner.lastReport,
      ledger: opts.ledger.stats(),
      schedule: {
        intervalMinutes: opts.schedule.intervalMinutes,
        timezone: opts.schedule.timezone,
      },
    });
  });
}
