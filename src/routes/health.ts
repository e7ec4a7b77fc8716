import type { FastifyInstance } from 'fastify';
import type { Database as DatabaseType } from 'better-sqlite3';

export interface HealthRouteOptions {
  sqlite: DatabaseType;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get('/health', async (_request, reply) => {
    try {
      // Quick DB connectivity check
      const result: unknown = opts.sqlite.prepare('SELECT 1 AS ok').get();
      const connected =
        typeof result === 'object' && result !== null && 'ok' in result && result.ok === 1;
      return reply.send({
        status: 'ok',
        db: connected ? 'connected' : 'error',
        uptime: process.uptime(),
      });
    } catch {
      return reply.status(503).send({
        status: 'error',
        db: 'disconnected',
      });
    }
  });
}
