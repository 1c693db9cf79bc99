/**
 * Tests for the feed validator
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { FeedFetcher, type FetchLike } from '../../src/feeds/fetcher';
import { FeedValidator } from '../../src/feeds/validator';
import type { RetryPolicy } from '../../src/lib/retry';
import { RecordingLogger } from '../fakes/logger';

const URL_UNDER_TEST = 'https://example.org/feed.xml';

const VALID_RSS = `<rss version="2.0"><channel><title>Example</title>
<item><title>Entry</title><link>https://example.org/1</link></item>
</channel></rss>`;

const NO_RETRY_DELAY: RetryPolicy = { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, factor: 1, jitter: 0 };

const EMPTY_RSS = '<rss version="2.0"><channel><title>Example</title></channel></rss>';

describe('FeedValidator', () => {
  let mockFetch: Mock<FetchLike>;
  let now: number;

  beforeEach(() => {
    mockFetch = vi.fn<FetchLike>();
    now = 0;
  });

  const createValidator = () => {
    const logger = new RecordingLogger();
    const fetcher = new FeedFetcher({}, { fetchImpl: mockFetch, logger });
    return new FeedValidator({ cacheTtlMs: 1_000, retryPolicy: NO_RETRY_DELAY }, { fetcher, logger, now: () => now });
  };

  it('should reject non-http URLs without a request', async () => {
    const result = await createValidator().validate('ftp://example.org/feed.xml');

    expect(result).toEqual({ ok: false, reason: 'URL must use http or https', cached: false });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should accept a feed with entries', async () => {
    mockFetch.mockImplementation(async () => new Response(VALID_RSS));

    const result = await createValidator().validate(URL_UNDER_TEST);

    expect(result).toEqual({ ok: true, reason: 'valid', format: 'rss', entryCount: 1, cached: false });
  });

  it('should serve repeated checks from the cache until the TTL passes', async () => {
    mockFetch.mockImplementation(async () => new Response(VALID_RSS));
    const validator = createValidator();

    await validator.validate(URL_UNDER_TEST);
    now = 999;
    const cached = await validator.validate(URL_UNDER_TEST);
    now = 1_000;
    const refreshed = await validator.validate(URL_UNDER_TEST);

    expect(cached.cached).toBe(true);
    expect(refreshed.cached).toBe(false);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should cache negative verdicts too', async () => {
    mockFetch.mockImplementation(async () => new Response(EMPTY_RSS));
    const validator = createValidator();

    const first = await validator.validate(URL_UNDER_TEST);
    const second = await validator.validate(URL_UNDER_TEST);

    expect(first).toEqual({ ok: false, reason: 'feed has no entries', format: 'rss', entryCount: 0, cached: false });
    expect(second.cached).toBe(true);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should report unreachable feeds', async () => {
    mockFetch.mockImplementation(async () => new Response('missing', { status: 404 }));

    const result = await createValidator().validate(URL_UNDER_TEST);

    expect(result.reason).toBe('unreachable: Failed to fetch https://example.org/feed.xml: HTTP 404');
  });

  it('should retry a transient failure before giving a verdict', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockImplementation(async () => new Response(VALID_RSS));

    const result = await createValidator().validate(URL_UNDER_TEST);

    expect(result).toEqual({ ok: true, reason: 'valid', format: 'rss', entryCount: 1, cached: false });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should not cache a verdict from a transient failure', async () => {
    mockFetch.mockImplementation(async () => new Response('busy', { status: 503 }));
    const validator = createValidator();

    const first = await validator.validate(URL_UNDER_TEST);
    const second = await validator.validate(URL_UNDER_TEST);

    expect(first).toEqual({
      ok: false,
      reason: 'unreachable: Failed to fetch https://example.org/feed.xml: HTTP 503',
      cached: false,
    });
    expect(second.cached).toBe(false);
    expect(mockFetch).toHaveBeenCalledTimes(4);
  });

  it('should report documents that are not feeds', async () => {
    mockFetch.mockImplementation(async () => new Response('<html><body><p>hi</p></body></html>'));

    const result = await createValidator().validate(URL_UNDER_TEST);

    expect(result.reason).toBe(
      'unparseable: Failed to parse https://example.org/feed.xml: unrecognized feed format'
    );
  });
});
