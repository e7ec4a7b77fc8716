import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createDatabase, type DatabaseHandle } from '../../../src/db/client.js';
import { ReplyLedger } from '../../../src/db/reply-ledger.js';
import { CycleRunner } from '../../../src/jobs/cycle-runner.js';
import { AuthExpiredError } from '../../../src/lib/errors.js';
import { isAuthorized } from '../../../src/routes/trigger.js';
import { buildServer } from '../../../src/server.js';
import { createCycleReport } from '../../../src/workflows/cycle-report.js';
import type { PreviewReport } from '../../../src/workflows/review-preview.js';
import type { CycleReport, CycleTrigger } from '../../../src/workflows/types.js';

const STARTED_AT = new Date('2026-03-01T10:00:00Z');

function previewReport(): PreviewReport {
  return {
    generatedAt: STARTED_AT,
    fetched: 2,
    candidates: 1,
    deferred: 0,
    previews: [
      {
        reviewId: 'r1',
        authorName: 'Sam',
        rating: 5,
        body: 'Lovely staff',
        replyText: 'Thanks Sam!',
      },
    ],
    failures: [],
  };
}

describe('HTTP server', () => {
  let database: DatabaseHandle;
  let ledger: ReplyLedger;
  let pending: Array<(report: CycleReport) => void>;
  let runner: CycleRunner;
  let app: FastifyInstance;
  let preview: Mock<() => Promise<PreviewReport>>;

  function finishRunningCycle(trigger: CycleTrigger = 'manual'): CycleReport {
    const report = { ...createCycleReport(trigger, STARTED_AT), fetched: 3, replied: 1 };
    for (const resolve of pending.splice(0)) resolve(report);
    return report;
  }

  async function start(triggerToken?: string) {
    app = await buildServer({
      sqlite: database.sqlite,
      runner,
      ledger,
      schedule: { intervalMinutes: 60, timezone: 'UTC', runOnStartup: false },
      triggerToken,
      preview,
    });
  }

  beforeEach(() => {
    database = createDatabase(':memory:');
    ledger = new ReplyLedger(database.db);
    pending = [];
    preview = vi.fn(async () => previewReport());
    runner = new CycleRunner(
      () => new Promise<CycleReport>((resolve) => pending.push(resolve)),
    );
  });

  afterEach(async () => {
    finishRunningCycle();
    await runner.whenIdle();
    await app.close();
    if (database.sqlite.open) database.sqlite.close();
  });

  describe('GET /health', () => {
    it('should report a connected database', async () => {
      await start();

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: 'ok', db: 'connected' });
    });

    it('should return 503 when the database is gone', async () => {
      await start();
      database.sqlite.close();

      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(503);
      expect(res.json()).toEqual({ status: 'error', db: 'disconnected' });
    });
  });

  describe('/trigger', () => {
    it('should start a manual cycle and return immediately', async () => {
      await start();

      const res = await app.inject({ method: 'POST', url: '/trigger' });

      expect(res.statusCode).toBe(202);
      expect(res.json()).toMatchObject({ status: 'started', trigger: 'manual' });
      expect(runner.current).toMatchObject({ status: 'running', trigger: 'manual' });
    });

    it('should accept GET as well', async () => {
      await start();

      const res = await app.inject({ method: 'GET', url: '/trigger' });

      expect(res.statusCode).toBe(202);
    });

    it('should refuse to overlap a running cycle', async () => {
      await start();
      const running = runner.trigger('scheduled');
      if (!running.accepted) throw new Error('expected the trigger to be accepted');

      const res = await app.inject({ method: 'POST', url: '/trigger' });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        status: 'ignored',
        reason: 'cycle_in_progress',
        runningSince: running.startedAt.toISOString(),
        runningTrigger: 'scheduled',
      });
    });

    it('should wait for the report when asked', async () => {
      await start();

      const inflight = app.inject({ method: 'POST', url: '/trigger?wait=true' });
      await vi.waitFor(() => expect(runner.current.status).toBe('running'));
      finishRunningCycle();
      const res = await inflight;

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: 'completed',
        report: {
          trigger: 'manual',
          status: 'completed',
          startedAt: '2026-03-01T10:00:00.000Z',
          fetched: 3,
          replied: 1,
        },
      });
    });

    it('should require the bearer token when one is configured', async () => {
      await start('test-trigger-secret');

      const missing = await app.inject({ method: 'POST', url: '/trigger' });
      const wrong = await app.inject({
        method: 'POST',
        url: '/trigger',
        headers: { authorization: 'Bearer not-the-secret' },
      });
      const right = await app.inject({
        method: 'POST',
        url: '/trigger',
        headers: { authorization: 'Bearer test-trigger-secret' },
      });

      expect(missing.statusCode).toBe(401);
      expect(missing.json()).toEqual({ error: 'Unauthorized' });
      expect(wrong.statusCode).toBe(401);
      expect(right.statusCode).toBe(202);
    });
  });

  describe('errors', () => {
    it('should pass client errors through with their status', async () => {
      await start();

      const res = await app.inject({
        method: 'POST',
        url: '/trigger',
        headers: { 'content-type': 'application/json' },
        payload: '{not json',
      });

      expect(res.statusCode).toBe(400);
      expect(Object.keys(res.json())).toEqual(['error']);
      expect(runner.current).toEqual({ status: 'idle' });
    });
  });

  describe('GET /reviews/preview', () => {
    it('should return drafted replies without starting a cycle', async () => {
      await start();

      const res = await app.inject({ method: 'GET', url: '/reviews/preview' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        status: 'completed',
        generatedAt: '2026-03-01T10:00:00.000Z',
        fetched: 2,
        candidates: 1,
        deferred: 0,
        previews: [
          {
            reviewId: 'r1',
            authorName: 'Sam',
            rating: 5,
            body: 'Lovely staff',
            replyText: 'Thanks Sam!',
          },
        ],
        failures: [],
      });
      expect(preview).toHaveBeenCalledTimes(1);
      expect(runner.lastReport).toBeNull();
      expect(runner.current).toEqual({ status: 'idle' });
    });

    it('should refuse to run while a cycle runs', async () => {
      await start();
      runner.trigger('scheduled');

      const res = await app.inject({ method: 'GET', url: '/reviews/preview' });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        status: 'ignored',
        reason: 'cycle_in_progress',
        runningSince: expect.any(String),
        runningTrigger: 'scheduled',
      });
      expect(preview).not.toHaveBeenCalled();
    });

    it('should require the bearer token when one is configured', async () => {
      await start('test-trigger-secret');

      const missing = await app.inject({ method: 'GET', url: '/reviews/preview' });
      const right = await app.inject({
        method: 'GET',
        url: '/reviews/preview',
        headers: { authorization: 'Bearer test-trigger-secret' },
      });

      expect(missing.statusCode).toBe(401);
      expect(missing.json()).toEqual({ error: 'Unauthorized' });
      expect(right.statusCode).toBe(200);
      expect(preview).toHaveBeenCalledTimes(1);
    });

    it('should map an upstream failure to 502', async () => {
      preview.mockRejectedValueOnce(new AuthExpiredError('GBP token refresh failed'));
      await start();

      const res = await app.inject({ method: 'GET', url: '/reviews/preview' });

      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({ error: 'GBP token refresh failed', kind: 'auth_expired' });
      expect(runner.current).toEqual({ status: 'idle' });
    });
  });

  describe('GET /status', () => {
    it('should report runner state, last cycle and ledger counts', async () => {
      await start();
      ledger.record('r1', 'Thanks!', 'succeeded');
      ledger.record('r2', 'Thanks!', 'failed', 'upstream_unavailable');

      const before = await app.inject({ method: 'GET', url: '/status' });
      expect(before.json()).toEqual({
        runner: { status: 'idle' },
        lastReport: null,
        ledger: { succeeded: 1, failed: 1, skipped: 0 },
        schedule: { intervalMinutes: 60, timezone: 'UTC' },
      });

      const result = runner.trigger('manual');
      finishRunningCycle();
      if (result.accepted) await result.done;

      const after = await app.inject({ method: 'GET', url: '/status' });
      expect(after.json()).toMatchObject({
        runner: { status: 'idle' },
        lastReport: { trigger: 'manual', fetched: 3 },
      });
    });
  });
});

describe('isAuthorized', () => {
  it('should compare bearer tokens exactly', () => {
    expect(isAuthorized('Bearer test-trigger-secret', 'test-trigger-secret')).toBe(true);
    expect(isAuthorized('Bearer test-trigger-secre', 'test-trigger-secret')).toBe(false);
    expect(isAuthorized('test-trigger-secret', 'test-trigger-secret')).toBe(false);
    expect(isAuthorized(undefined, 'test-trigger-secret')).toBe(false);
  });
});
