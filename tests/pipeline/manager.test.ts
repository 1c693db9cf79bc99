/**
 * Tests for the pipeline pass
 */

import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import { RssManager } from '../../src/pipeline/manager';
import { createPipelineContext } from '../../src/pipeline/context';
import { loadConfig } from '../../src/config';
import type { FetchLike } from '../../src/feeds/fetcher';
import { InMemoryStorage, createFeed, createItem } from '../fakes/storage';
import { FakeEmbeddings } from '../fakes/embeddings';
import { FakeModelLoader, type FakeLoaderOptions } from '../fakes/translation';
import { RecordingChannel } from '../fakes/channel';
import { RecordingLogger } from '../fakes/logger';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const minutesAfter = (minutes: number) => new Date(NOW.getTime() + minutes * 60_000);

const FEED_URL = 'https://example.org/feed.xml';

interface Story {
  title: string;
  link: string;
  content: string;
}

const COMPILER: Story = {
  title: 'New compiler release ships',
  link: 'https://example.org/news/compiler',
  content: 'The compiler team shipped a release with faster builds and better error messages today.',
};

const COMPILER_MIRROR: Story = {
  title: 'Compiler release now available',
  link: 'https://example.org/news/compiler-mirror',
  content: 'The compiler team shipped a release with faster builds and better error messages for everyone.',
};

const DATABASE: Story = {
  title: 'Database engine gets replication',
  link: 'https://example.org/news/database',
  content: 'The database engine now supports streaming replication across regions with automatic failover built in.',
};

const rss = (stories: Story[]) => `<?xml version="1.0"?>
<rss version="2.0"><channel><title>Example Tech</title>
${stories
  .map((s) => `<item><title>${s.title}</title><link>${s.link}</link><description>${s.content}</description></item>`)
  .join('\n')}
</channel></rss>`;

/** One direction per story topic */
function topicVector(text: string): number[] {
  const lower = text.toLowerCase();
  if (lower.includes('compiler')) return [1, 0, 0, 0];
  if (lower.includes('database')) return [0, 1, 0, 0];
  return [0, 0, 0, 1];
}

interface HarnessOptions {
  env?: Record<string, string>;
  loader?: FakeLoaderOptions;
}

describe('RssManager', () => {
  let manager: RssManager | null = null;

  afterEach(async () => {
    await manager?.shutdown();
    manager = null;
  });

  const createHarness = (options: HarnessOptions = {}) => {
    const config = loadConfig({
      CHANNEL_IDS: '{"en":"@feed_en","de":"@feed_de"}',
      TELEGRAM_BOT_TOKEN: 'test-token',
      TRANSLATION_MAX_RETRIES: '0',
      ...options.env,
    });
    const storage = new InMemoryStorage(() => NOW);
    storage.feeds = [createFeed()];
    const channel = new RecordingChannel();
    const logger = new RecordingLogger();
    const loader = new FakeModelLoader(options.loader);
    let stories: Story[] = [COMPILER, DATABASE];
    const fetchImpl: Mock<FetchLike> = vi.fn<FetchLike>(async () => new Response(rss(stories)));

    const ctx = createPipelineContext(config, {
      storage,
      embeddings: new FakeEmbeddings(topicVector, 4),
      modelLoader: loader,
      channel,
      fetchImpl,
      logger,
    });
    const created = new RssManager(ctx);
    manager = created;

    const idFor = (link: string) =>
      [...storage.items.values()].find((item) => item.sourceUrl === link)?.newsId;

    return {
      manager: created,
      storage,
      channel,
      logger,
      fetchImpl,
      idFor,
      setStories: (next: Story[]) => {
        stories = next;
      },
    };
  };

  it('should fetch, store, translate and publish the oldest pending item', async () => {
    const { manager, storage, channel, idFor } = createHarness();

    const report = await manager.runOnce({ now: () => NOW });

    const compilerId = idFor(COMPILER.link);
    expect(compilerId).toBeDefined();
    expect(report.totals).toEqual({
      fetched: 2,
      duplicates: 0,
      persisted: 2,
      persistFailures: 0,
      classifierFailures: 0,
      translated: 2,
      translationFallbacks: 0,
      published: 2,
      gated: 1,
      publishFailures: 0,
    });
    expect(report.feeds[0]).toMatchObject({ feedId: 1, ok: true, stage: 'gating', errors: [] });
    expect(channel.sent).toEqual([
      {
        newsId: compilerId,
        recipientId: '@feed_de',
        language: 'de',
        title: '[de] New compiler release ships',
        translationId: expect.any(Number),
      },
      {
        newsId: compilerId,
        recipientId: '@feed_en',
        language: 'en',
        title: 'New compiler release ships',
        translationId: null,
      },
    ]);
    expect(storage.publications.map((p) => [p.recipientId, p.language, p.messageId])).toEqual([
      ['@feed_de', 'de', '100'],
      ['@feed_en', 'en', '101'],
    ]);
    expect(storage.fetchedAt.get(1)).toEqual(NOW);
  });

  it('should store the translation and the embedding with each item', async () => {
    const { manager, storage, idFor } = createHarness();

    await manager.runOnce({ now: () => NOW, publish: false });

    const compilerId = idFor(COMPILER.link) ?? '';
    expect(storage.items.get(compilerId)?.embedding).toEqual([1, 0, 0, 0]);
    expect(storage.translations.filter((t) => t.newsId === compilerId)).toMatchObject([
      {
        language: 'de',
        translatedTitle: '[de] New compiler release ships',
        translatedContent: `[de] ${COMPILER.content}`,
      },
    ]);
  });

  it('should publish the next pending item once the interval has passed', async () => {
    const { manager, channel, idFor } = createHarness();

    await manager.runOnce({ now: () => NOW });
    const second = await manager.runOnce({ now: () => minutesAfter(7) });

    expect(second.totals).toMatchObject({ fetched: 2, duplicates: 2, persisted: 0, published: 2, gated: 0 });
    expect(channel.sent.map((m) => m.newsId)).toEqual([
      idFor(COMPILER.link),
      idFor(COMPILER.link),
      idFor(DATABASE.link),
      idFor(DATABASE.link),
    ]);
  });

  it('should hold everything back until the interval has passed', async () => {
    const { manager, channel } = createHarness();

    await manager.runOnce({ now: () => NOW });
    const early = await manager.runOnce({ now: () => minutesAfter(3) });

    expect(early.totals).toMatchObject({ published: 0, gated: 1 });
    expect(channel.sent).toHaveLength(2);
  });

  it('should drop similar stories and known links', async () => {
    const { manager, storage, setStories } = createHarness();
    storage.items.set(
      'seeded',
      createItem({ newsId: 'seeded', sourceUrl: DATABASE.link, rssFeedId: 1, createdAt: NOW.toISOString() })
    );
    setStories([COMPILER, COMPILER_MIRROR, DATABASE]);

    const first = await manager.runOnce({ now: () => NOW, publish: false });
    const second = await manager.runOnce({ now: () => NOW, publish: false });

    expect(first.totals).toMatchObject({ fetched: 3, persisted: 1, duplicates: 2 });
    expect(second.totals).toMatchObject({ fetched: 3, persisted: 0, duplicates: 3 });
    expect(storage.items.size).toBe(2);
  });

  it('should publish the original text when a translation fails and log it once', async () => {
    const { manager, channel, logger } = createHarness({ loader: { failTargets: new Set(['de']) } });

    const report = await manager.runOnce({ now: () => NOW });

    expect(report.totals).toMatchObject({ translated: 0, translationFallbacks: 2, published: 2 });
    expect(channel.sent[0]).toMatchObject({
      recipientId: '@feed_de',
      title: 'New compiler release ships',
      translationId: null,
    });
    const warnings = logger.find('warn', 'Translation failed, falling back to original');
    expect(warnings).toHaveLength(2);
    expect(warnings[0]?.context).toMatchObject({ language: 'de', feedId: 1 });
    expect(logger.entries.filter((e) => e.level === 'warn')).toHaveLength(2);
    expect(logger.find('debug', 'Translation batch failed').length).toBeGreaterThan(0);
  });

  it('should not publish on a dry run', async () => {
    const { manager, storage, channel } = createHarness();

    const report = await manager.runOnce({ now: () => NOW, publish: false });

    expect(report.totals).toMatchObject({ persisted: 2, translated: 2, published: 0 });
    expect(report.feeds[0]?.stage).toBe('translating');
    expect(channel.sent).toEqual([]);
    expect(storage.publications).toEqual([]);
  });

  it('should retry a failed item save', async () => {
    const { manager, storage, logger, setStories } = createHarness();
    setStories([COMPILER]);
    storage.saveItemFailures = 1;

    const report = await manager.runOnce({ now: () => NOW, publish: false });

    expect(report.totals).toMatchObject({ persisted: 1, persistFailures: 0 });
    expect(storage.saveItemCalls).toBe(2);
    expect(logger.find('warn', 'Retrying item save')).toHaveLength(1);
  });

  it('should report an item that cannot be saved and carry on', async () => {
    const { manager, storage, logger, idFor } = createHarness({ env: { STORAGE_MAX_RETRIES: '1' } });
    storage.saveItemFailures = 1;

    const report = await manager.runOnce({ now: () => NOW, publish: false });

    expect(report.totals).toMatchObject({ persisted: 1, persistFailures: 1 });
    expect(idFor(COMPILER.link)).toBeUndefined();
    expect(idFor(DATABASE.link)).toBeDefined();
    expect(report.feeds[0]?.errors).toHaveLength(1);
    expect(report.feeds[0]?.errors[0]).toMatch(/^saveItem [0-9a-f]{64}: Storage saveItem failed: connection reset$/);
    expect(logger.find('error', 'Failed to persist item')).toHaveLength(1);
  });

  it('should retry recipients whose delivery failed on a later pass', async () => {
    const { manager, channel, idFor } = createHarness();
    channel.failing.add('@feed_de');

    const first = await manager.runOnce({ now: () => NOW });
    const compilerId = idFor(COMPILER.link);

    expect(first.totals).toMatchObject({ published: 1, publishFailures: 1 });
    expect(first.feeds[0]?.errors).toEqual([`publish ${compilerId} → @feed_de: chat not found`]);

    channel.failing.clear();
    await manager.runOnce({ now: () => minutesAfter(7) });

    expect(channel.sent.map((m) => [m.newsId, m.recipientId])).toEqual([
      [compilerId, '@feed_en'],
      [compilerId, '@feed_de'],
    ]);
  });

  it('should still publish the backlog when a fetch fails', async () => {
    const { manager, storage, channel, fetchImpl } = createHarness();
    fetchImpl.mockImplementation(async () => new Response('gone', { status: 404 }));
    storage.items.set(
      'backlog-1',
      createItem({
        newsId: 'backlog-1',
        rssFeedId: 1,
        sourceUrl: 'https://example.org/news/backlog',
        createdAt: new Date(NOW.getTime() - 3_600_000).toISOString(),
      })
    );

    const report = await manager.runOnce({ now: () => NOW });

    expect(report.feeds[0]).toMatchObject({
      ok: false,
      errors: [`Failed to fetch ${FEED_URL}: HTTP 404`],
    });
    expect(report.totals.published).toBe(2);
    expect(channel.sent.map((m) => [m.newsId, m.recipientId, m.translationId])).toEqual([
      ['backlog-1', '@feed_de', null],
      ['backlog-1', '@feed_en', null],
    ]);
  });

  it('should report a feed list that cannot be loaded', async () => {
    const { manager, storage, logger } = createHarness();
    storage.feedsError = new Error('connection refused');

    const report = await manager.runOnce({ now: () => NOW });

    expect(report.feeds).toEqual([]);
    expect(report.errors).toEqual(['listActiveFeeds: connection refused']);
    expect(logger.find('error', 'Failed to load feeds')).toHaveLength(1);
  });

  it('should share a pass already in progress', async () => {
    const { manager, fetchImpl } = createHarness();

    const [a, b] = await Promise.all([
      manager.runOnce({ now: () => NOW, publish: false }),
      manager.runOnce({ now: () => NOW, publish: false }),
    ]);

    expect(a).toBe(b);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(manager.running).toBe(false);
  });

  it('should translate nothing without channel recipients', async () => {
    const { manager, channel } = createHarness({ env: { CHANNEL_IDS: '{}' } });

    const report = await manager.runOnce({ now: () => NOW });

    expect(report.totals).toMatchObject({ persisted: 2, translated: 0, published: 0 });
    expect(channel.sent).toEqual([]);
  });

  it('should refuse new passes after shutdown', async () => {
    const { manager, logger } = createHarness();

    await manager.shutdown();
    await manager.shutdown();

    await expect(manager.runOnce()).rejects.toThrow('Pipeline is shut down');
    expect(logger.find('info', 'Pipeline shut down')).toHaveLength(1);
  });

  it('should validate feed URLs', async () => {
    const { manager } = createHarness();

    const result = await manager.validateFeed(FEED_URL);

    expect(result).toEqual({ ok: true, reason: 'valid', format: 'rss', entryCount: 2, cached: false });
  });
});
