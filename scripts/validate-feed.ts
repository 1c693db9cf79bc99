/**
 * FeedRelay — Validate Feed Script
 *
 * Checks that a URL serves a readable RSS/Atom/RDF feed with entries.
 *
 * Usage:
 *   npm run validate-feed -- https://example.org/feed.xml
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { toErrorMessage } from '../src/lib/errors';
import { loadConfig } from '../src/config';
import { FeedFetcher } from '../src/feeds/fetcher';
import { FeedValidator } from '../src/feeds/validator';

async function main(): Promise<void> {
  const url = process.argv[2];
  if (!url) {
    console.error('Usage: npm run validate-feed -- <url>');
    process.exit(2);
  }

  const config = loadConfig();
  const fetcher = new FeedFetcher({
    requestTimeoutMs: config.rss.requestTimeoutMs,
    userAgent: config.rss.userAgent,
  });
  const validator = new FeedValidator({ timeoutMs: config.rss.requestTimeoutMs }, { fetcher });

  const result = await validator.validate(url);
  if (result.ok) {
    console.log(`OK   ${url} (${result.format ?? 'unknown'}, ${result.entryCount ?? 0} entries)`);
  } else {
    console.log(`FAIL ${url}: ${result.reason}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Validation failed', { error: toErrorMessage(error) });
  process.exit(1);
});
