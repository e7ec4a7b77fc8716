import { config } from './config/env.js';
import { createApplication } from './app.js';
import { buildServer } from './server.js';
import { logger } from './lib/logger.js';
import { registerJobs } from './jobs/scheduler.js';

async function main() {
  const application = createApplication(config);
  const { database, ledger, runner, schedule, preview } = application;

  const app = await buildServer({
    sqlite: database.sqlite,
    runner,
    ledger,
    schedule,
    preview,
    triggerToken: config.TRIGGER_TOKEN,
  });

  let tasks: ReturnType<typeof registerJobs> = [];

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    for (const task of tasks) {
      task.stop();
    }
    await app.close();
    await runner.whenIdle();
    database.sqlite.close();
    logger.info('Server shut down gracefully');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.fatal({ err, signal }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ err: reason }, 'Unhandled rejection');
  });

  await app.listen({ port: config.PORT, host: '0.0.0.0' });
  logger.info(`Server running on port ${config.PORT}`);

  // Start cron jobs after server is listening
  tasks = registerJobs(runner, schedule);
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
