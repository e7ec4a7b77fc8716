import pino from 'pino';
import { config } from '../config/env.js';

const transport =
  config.NODE_ENV === 'development'
    ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
    : undefined;

export const logger = pino(
  {
    level: config.LOG_LEVEL,
    name: 'review-autoreply',
    // Bearer tokens reach the logs through request serializers and error causes
    redact: ['req.headers.authorization', 'err.config.headers.Authorization'],
  },
  transport,
);

/** Child logger tagged with the component that writes through it. */
export function createChildLogger(service: string) {
  return logger.child({ service });
}
