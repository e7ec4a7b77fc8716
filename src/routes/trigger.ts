import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { CycleRunner } from '../jobs/cycle-runner.js';
import { createChildLogger } from '../lib/logger.js';

const log = createChildLogger('trigger');

export interface TriggerRouteOptions {
  runner: CycleRunner;
  /** When set, callers must send `Authorization: Bearer <token>`. */
  token?: string;
}

interface TriggerQuery {
  wait?: string;
}

export function isAuthorized(header: string | undefined, token: string): boolean {
  if (!header?.startsWith('Bearer ')) return false;
  const supplied = Buffer.from(header.slice('Bearer '.length));
  const expected = Buffer.from(token);
  return supplied.length === expected.length && timingSafeEqual(supplied, expected);
}

export async function triggerRoutes(app: FastifyInstance, opts: TriggerRouteOptions) {
  const handler = async (
    request: FastifyRequest<{ Querystring: TriggerQuery }>,
    reply: FastifyReply,
  ) => {
    if (opts.token && !isAuthorized(request.headers.authorization, opts.token)) {
      return reply.status(401).send({ error: 'Unauthorized' });
    }

    const result = opts.runner.trigger('manual');

    if (!result.accepted) {
      return reply.status(409).send({
        status: 'ignored',
        reason: result.reason,
        runningSince: result.runningSince.toISOString(),
        runningTrigger: result.runningTrigger,
      });
    }

    log.info('Manual review reply cycle started');

    if (request.query.wait === 'true') {
      const report = await result.done;
      return reply.send({ status: 'completed', report });
    }

    return reply.status(202).send({
      status: 'started',
      trigger: 'manual',
      startedAt: result.startedAt.toISOString(),
    });
  };

  app.post<{ Querystring: TriggerQuery }>('/trigger', handler);
  app.get<{ Querystring: TriggerQuery }>('/trigger', handler);
}
