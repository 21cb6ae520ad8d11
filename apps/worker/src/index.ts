import { createLogger, withTiming } from '@mailpilot/utils';
import { getEnv, loadPipelinePolicy } from '@mailpilot/config';
import { closeDb, getDb } from '@mailpilot/database';
import { createContainer } from './container.js';
import { buildJobTable } from './jobs.js';
import { Scheduler } from './scheduler/scheduler.js';

const logger = createLogger({ service: 'worker' });

async function main() {
  const env = getEnv();
  const policy = loadPipelinePolicy(env.PIPELINE_POLICY_PATH);

  logger.info({ policyVersion: policy.version }, 'Starting worker...');

  const { knowledgeBase, orchestrator } = createContainer(env, policy, getDb());

  const opened = await knowledgeBase.open();
  if (!opened.ok) {
    throw new Error(`Knowledge base could not be opened: ${opened.error.message}`);
  }
  if (env.KNOWLEDGE_SEED_DIR) {
    const seedDir = env.KNOWLEDGE_SEED_DIR;
    const seeded = await withTiming(logger, 'Knowledge seed', () => knowledgeBase.loadFromDirectory(seedDir));
    if (seeded.ok) {
      logger.info(seeded.value, 'Knowledge base seeded');
    } else {
      logger.warn({ error: seeded.error.message }, 'Knowledge seed directory not loaded');
    }
  }
  logger.info(knowledgeBase.getStats(), 'Knowledge base ready');

  const scheduler = new Scheduler();
  const jobs = buildJobTable(
    orchestrator,
    policy,
    env.SCHEDULER_TIMEZONE ? { timezone: env.SCHEDULER_TIMEZONE } : {}
  );
  for (const job of jobs) {
    const added = scheduler.addJob(job);
    if (!added.ok) {
      throw new Error(added.error.message);
    }
  }
  scheduler.start();

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Received shutdown signal');
      scheduler
        .stop()
        .then(() => closeDb())
        .then(() => {
          logger.info('Worker shut down gracefully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ error }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start worker');
  process.exit(1);
});
