/**
 * Tests for the model manager
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ModelManager, type ModelManagerConfig } from '../../src/translation/model-manager';
import { sleep } from '../../src/lib/concurrency';
import { FakeModelLoader, type FakeLoaderOptions, type FakeModel } from '../fakes/translation';
import { RecordingLogger } from '../fakes/logger';

describe('ModelManager', () => {
  let now: number;
  let logger: RecordingLogger;

  beforeEach(() => {
    now = 0;
    logger = new RecordingLogger();
  });

  const createManager = (config: ModelManagerConfig = {}, loaderOptions: FakeLoaderOptions = {}) => {
    const loader = new FakeModelLoader(loaderOptions);
    const manager = new ModelManager<FakeModel>(
      { cleanupIntervalMs: 0, ...config },
      { loader, logger, now: () => now }
    );
    return { loader, manager };
  };

  it('should load a model once for concurrent callers', async () => {
    const { loader, manager } = createManager({}, { loadDelayMs: 20 });

    const names = await Promise.all([
      manager.withModel('en-de', async (m) => m.name),
      manager.withModel('en-de', async (m) => m.name),
      manager.withModel('en-de', async (m) => m.name),
    ]);

    expect(names).toEqual(['en-de', 'en-de', 'en-de']);
    expect(loader.loads).toEqual(['en-de']);
  });

  it('should count hits and misses', async () => {
    const { manager } = createManager();

    await manager.getModel('en-de');
    await manager.getModel('en-de');

    expect(manager.stats()).toMatchObject({ loads: 1, hits: 1, misses: 1 });
  });

  it('should evict the least recently used model past capacity', async () => {
    const { loader, manager } = createManager({ maxResident: 2 });

    await manager.getModel('en-de');
    await manager.getModel('en-fr');
    await manager.getModel('en-de');
    await manager.getModel('en-es');

    expect(manager.stats().resident).toEqual(['en-de', 'en-es']);
    expect(loader.models.map((m) => [m.name, m.disposed])).toEqual([
      ['en-de', false],
      ['en-fr', true],
      ['en-es', false],
    ]);
  });

  it('should dispose a model evicted while borrowed only after it is returned', async () => {
    const { manager } = createManager({ maxResident: 1 });
    let disposedWhileBorrowed: boolean | null = null;
    let borrowed: FakeModel | null = null;

    await manager.withModel('en-de', async (model) => {
      borrowed = model;
      await manager.withModel('en-fr', async () => undefined);
      disposedWhileBorrowed = model.disposed;
    });

    expect(disposedWhileBorrowed).toBe(false);
    expect(borrowed).toMatchObject({ name: 'en-de', disposed: true });
    expect(manager.isResident('en-de')).toBe(false);
    expect(manager.isResident('en-fr')).toBe(true);
  });

  it('should unload idle models', async () => {
    const { loader, manager } = createManager({ idleTimeoutMs: 1_000 });

    await manager.getModel('en-de');
    now = 1_000;
    await manager.getModel('en-fr');

    const unloaded = await manager.sweepIdle(1_500);

    expect(unloaded).toEqual(['en-de']);
    expect(loader.models[0]?.disposed).toBe(true);
    expect(manager.stats().resident).toEqual(['en-fr']);
  });

  it('should not cache failed loads', async () => {
    const { loader, manager } = createManager({}, { failingLoads: new Set(['en-xx']) });

    await expect(manager.getModel('en-xx')).rejects.toThrow(
      'Model en-xx: load failed: Model en-xx: weights unavailable'
    );
    await expect(manager.getModel('en-xx')).rejects.toThrow('load failed');

    expect(loader.loads).toEqual(['en-xx', 'en-xx']);
    expect(manager.stats().loadFailures).toBe(2);
    expect(logger.find('error', 'Model load failed')).toHaveLength(2);
  });

  it('should time out slow loads and dispose the late result', async () => {
    const { loader, manager } = createManager({ loadTimeoutMs: 10 }, { loadDelayMs: 40 });

    await expect(manager.getModel('en-de')).rejects.toThrow(
      'Model en-de: load failed: Loading model en-de timed out after 10ms'
    );

    await sleep(60);
    expect(loader.models[0]?.disposed).toBe(true);
    expect(manager.isResident('en-de')).toBe(false);
  });

  it('should report which preloads succeeded', async () => {
    const { manager } = createManager({}, { failingLoads: new Set(['en-xx']) });

    const loaded = await manager.preload(['en-de', 'en-xx']);

    expect(loaded).toEqual(['en-de']);
    expect(logger.find('warn', 'Model preload failed')).toHaveLength(1);
  });

  it('should dispose everything and refuse work after shutdown', async () => {
    const { loader, manager } = createManager();
    await manager.getModel('en-de');

    await manager.shutdown();

    expect(loader.models[0]?.disposed).toBe(true);
    expect(manager.residentCount).toBe(0);
    await expect(manager.getModel('en-de')).rejects.toThrow('Model manager is shut down');
  });
});
