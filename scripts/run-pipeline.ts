/**
 * FeedRelay — Run Pipeline Script
 *
 * Runs a single pass over every active feed:
 * Fetch → Dedup → Persist → Translate → Gate/Publish
 *
 * Usage:
 *   npm run pipeline                 # Full pass
 *   npm run pipeline -- --dry-run    # Ingest and translate, publish nothing
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { toErrorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/config';
import { createPipelineContext } from '../src/pipeline/context';
import { RssManager } from '../src/pipeline/manager';
import type { PassReport } from '../src/types/pipeline';

// ============================================================
// CONFIGURATION
// ============================================================

interface RunArgs {
  dryRun: boolean;
}

function parseArgs(): RunArgs {
  const args = process.argv.slice(2);
  return { dryRun: args.includes('--dry-run') };
}

// ============================================================
// OUTPUT
// ============================================================

function printSummary(report: PassReport, dryRun: boolean): void {
  const { totals } = report;
  console.log('\n' + '='.repeat(60));
  console.log(dryRun ? 'PIPELINE PASS COMPLETE (dry run)' : 'PIPELINE PASS COMPLETE');
  console.log('='.repeat(60));
  console.log(`Pass: ${report.passId}`);
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  console.log(`Feeds: ${report.feeds.length} (${report.feeds.filter((f) => !f.ok).length} failed)`);
  console.log(`Entries fetched: ${totals.fetched}`);
  console.log(`Duplicates: ${totals.duplicates}`);
  console.log(`Stored: ${totals.persisted} (${totals.persistFailures} failed)`);
  console.log(`Translations: ${totals.translated} (${totals.translationFallbacks} fell back to original)`);
  console.log(`Published: ${totals.published} (${totals.gated} feeds gated, ${totals.publishFailures} failed)`);
  console.log('='.repeat(60) + '\n');

  for (const feed of report.feeds.filter((f) => f.errors.length > 0)) {
    console.log(`[${feed.feedId}] ${feed.feedName}`);
    for (const error of feed.errors) {
      console.log(`  - ${error}`);
    }
  }
}

// ============================================================
// MAIN
// ============================================================

async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadConfig();
  const manager = new RssManager(createPipelineContext(config));

  try {
    const report = await manager.runOnce({ publish: !args.dryRun });
    printSummary(report, args.dryRun);
  } finally {
    await manager.shutdown();
  }
}

main().catch((error: unknown) => {
  logger.error('Pipeline failed', { error: toErrorMessage(error) });
  process.exit(1);
});
