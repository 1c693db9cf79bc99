/**
 * FeedRelay — Scheduled Run Script
 *
 * Long-running process that triggers a pipeline pass on the PIPELINE_CRON
 * schedule. A tick that fires while a pass is still running joins that pass
 * instead of starting another.
 *
 * Usage:
 *   npm run scheduled
 *   PIPELINE_CRON="0 * * * *" npm run scheduled
 */

import 'dotenv/config';
import cron from 'node-cron';
import { logger } from '../src/lib/logger';
import { toErrorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/config';
import { createPipelineContext } from '../src/pipeline/context';
import { RssManager } from '../src/pipeline/manager';

async function runScheduledPass(manager: RssManager): Promise<void> {
  try {
    const report = await manager.runOnce();
    logger.info('Scheduled pass finished', {
      passId: report.passId,
      durationMs: report.durationMs,
      published: report.totals.published,
      errors: report.errors.length + report.feeds.reduce((n, f) => n + f.errors.length, 0),
    });
  } catch (error) {
    logger.error('Scheduled pass failed', { error: toErrorMessage(error) });
  }
}

function main(): void {
  const config = loadConfig();
  if (!cron.validate(config.schedule.cron)) {
    logger.error('Invalid PIPELINE_CRON expression', { cron: config.schedule.cron });
    process.exit(1);
  }

  const manager = new RssManager(createPipelineContext(config));
  const task = cron.schedule(config.schedule.cron, () => {
    void runScheduledPass(manager);
  });

  logger.info('Scheduler started', { cron: config.schedule.cron });
  void runScheduledPass(manager);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    task.stop();
    manager
      .shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: toErrorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => stop('SIGINT'));
  process.on('SIGTERM', () => stop('SIGTERM'));
}

try {
  main();
} catch (error) {
  logger.error('Scheduler failed to start', { error: toErrorMessage(error) });
  process.exit(1);
}
