import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { createChildLogger } from '../lib/logger.js';

const log = createChildLogger('error-handler');

export function globalErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
) {
  log.error(
    { err: error, requestId: request.id, url: request.url },
    'Unhandled error',
  );

  if (error.statusCode && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ error: error.message });
  }

  return reply.status(500).send({ error: 'Internal server error' });
}
