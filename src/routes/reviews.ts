import type { FastifyInstance } from 'fastify';
import type { CycleRunner } from '../jobs/cycle-runner.js';
import { ReplyBotError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';
import type { PreviewReport } from '../workflows/review-preview.js';
import { isAuthorized } from './trigger.js';

const log = createChildLogger('reviews');

export interface ReviewRouteOptions {
  runner: CycleRunner;
  preview: () => Promise<PreviewReport>;
  token?: string;
}

export async function reviewRoutes(app: FastifyInstance, opts: ReviewRouteOptions) {
  // GET /reviews/preview: draft replies for current candidates, post nothing
  app.get('/reviews/preview', async (request, reply) => {
    if (opts.token && !isAuthorized(request.headers.authorization, opts.token)) {
      return reply.status(401).send({ error: 'Unauthorized' });
    }

    const result = opts.runner.preview(opts.preview);

    if (!result.accepted) {
      return reply.status(409).send({
        status: 'ignored',
        reason: result.reason,
        runningSince: result.runningSince.toISOString(),
        runningTrigger: result.runningTrigger,
      });
    }

    try {
      const report = await result.done;
      return reply.send({ status: 'completed', ...report });
    } catch (err) {
      if (err instanceof ReplyBotError) {
        log.warn({ err }, 'Reply preview failed');
        return reply.status(502).send({ error: err.message, kind: err.kind });
      }
      throw err;
    }
  });
}
