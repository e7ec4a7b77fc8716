import type { Config } from './config/env.js';
import { createDatabase, type DatabaseHandle } from './db/client.js';
import { ReplyLedger } from './db/reply-ledger.js';
import { CycleRunner } from './jobs/cycle-runner.js';
import type { ScheduleOptions } from './jobs/scheduler.js';
import { createCredentialProvider, credentialSettingsFromEnv } from './services/gbp/auth.js';
import { GbpReviewsClient } from './services/gbp/reviews.js';
import { ReplyPoster } from './services/gbp/reply-poster.js';
import { ReplyGenerator, createMessagesApi } from './services/claude/client.js';
import { EmailNotifier, LogNotifier, createSmtpTransport } from './services/email/notifier.js';
import { runReconciliationCycle, type ReconciliationDeps } from './workflows/review-reply.js';
import { previewReplies, type PreviewReport } from './workflows/review-preview.js';
import type { Notifier } from './workflows/types.js';

export interface Application {
  database: DatabaseHandle;
  ledger: ReplyLedger;
  runner: CycleRunner;
  schedule: ScheduleOptions;
  preview: () => Promise<PreviewReport>;
}

function createNotifier(config: Config): Notifier {
  const { NOTIFY_EMAIL_TO, SMTP_HOST, SMTP_USER, SMTP_PASS } = config;
  if (!NOTIFY_EMAIL_TO || !SMTP_HOST || !SMTP_USER || !SMTP_PASS) {
    return new LogNotifier();
  }

  return new EmailNotifier({
    transport: createSmtpTransport({
      host: SMTP_HOST,
      port: config.SMTP_PORT,
      secure: config.SMTP_SECURE,
      user: SMTP_USER,
      pass: SMTP_PASS,
    }),
    from: config.EMAIL_FROM ?? SMTP_USER,
    to: NOTIFY_EMAIL_TO,
    businessName: config.REPLY_BUSINESS_NAME,
    notifyOn: config.NOTIFY_ON,
  });
}

/**
 * Wire every collaborator of the reconciliation cycle from the validated
 * configuration.
 */
export function createApplication(config: Config): Application {
  const database = createDatabase(config.DATABASE_PATH);
  const ledger = new ReplyLedger(database.db);

  const reviews = new GbpReviewsClient({
    location: { accountId: config.GBP_ACCOUNT_ID, locationId: config.GBP_LOCATION_ID },
    getAccessToken: createCredentialProvider(credentialSettingsFromEnv(config)),
    timeoutMs: config.GBP_TIMEOUT_MS,
  });

  const deps: ReconciliationDeps = {
    reviews,
    poster: new ReplyPoster(reviews),
    generator: new ReplyGenerator({
      messages: createMessagesApi(config.ANTHROPIC_API_KEY, config.AI_TIMEOUT_MS),
      model: config.ANTHROPIC_MODEL,
      overflowPolicy: config.REPLY_OVERFLOW_POLICY,
      style: {
        businessName: config.REPLY_BUSINESS_NAME,
        tone: config.REPLY_TONE,
        signOff: config.REPLY_SIGN_OFF,
        instructions: config.REPLY_INSTRUCTIONS,
        maxLength: config.REPLY_MAX_LENGTH,
      },
    }),
    ledger,
    notifier: createNotifier(config),
    options: {
      replySince: config.REPLY_SINCE,
      maxRepliesPerCycle: config.MAX_REPLIES_PER_CYCLE,
    },
  };

  const runner = new CycleRunner((trigger) => runReconciliationCycle(deps, trigger), {
    notifier: deps.notifier,
  });

  return {
    database,
    ledger,
    runner,
    preview: () => previewReplies(deps),
    schedule: {
      intervalMinutes: config.POLL_INTERVAL_MINUTES,
      timezone: config.POLL_TIMEZONE,
      runOnStartup: config.RUN_ON_STARTUP,
    },
  };
}
