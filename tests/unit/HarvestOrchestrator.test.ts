// tests/unit/HarvestOrchestrator.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import { HarvestOrchestrator } from '../../src/core/harvest/HarvestOrchestrator';
import type { OrchestratorConfig } from '../../src/core/harvest/HarvestOrchestrator';
import type { BatchFetcher, BatchOutcome } from '../../src/core/harvest/PostsFetcher';
import type { Checkpoint } from '../../src/core/records/types';
import { CheckpointStore } from '../../src/core/storage/CheckpointStore';
import { OutputWriter } from '../../src/core/storage/OutputWriter';
import { readSnapshot } from '../../src/core/storage/SnapshotReader';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { addSpanEvent } from '../../src/observability/tracing';
import {
  fileExists,
  makePost,
  makePosts,
  makeTempDir,
  readJson,
  removeTempDir,
} from '../helpers/fixtures';
import { InMemorySource, ScriptedFetcher, exhausted, page } from '../helpers/fakeSource';

vi.mock('../../src/observability/tracing', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/observability/tracing')>();
  return { ...actual, addSpanEvent: vi.fn() };
});

const envelope = { source: 'moltbook.com', description: 'Top posts' };

describe('HarvestOrchestrator', () => {
  let dir: string;
  let outputPath: string;
  let logger: Logger;
  let metrics: MetricsCollector;

  beforeEach(async () => {
    dir = await makeTempDir();
    outputPath = path.join(dir, 'posts.json');
    logger = new Logger({ level: 'error' });
    metrics = new MetricsCollector();
    vi.mocked(addSpanEvent).mockClear();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function setup(fetcher: BatchFetcher, config: Partial<OrchestratorConfig> = {}) {
    const output = new OutputWriter(outputPath, envelope, logger);
    const checkpoints = new CheckpointStore(outputPath, logger);
    const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    const orchestrator = new HarvestOrchestrator(
      {
        targetCount: 10,
        batchSize: 5,
        resume: true,
        successPause: 1000,
        failurePause: 5000,
        maxConsecutiveFailures: 3,
        ...config,
      },
      { fetcher, checkpoints, output, logger, metrics, sleep }
    );
    return { orchestrator, checkpoints, output, sleep };
  }

  describe('completion', () => {
    it('should collect two full batches and remove the checkpoint', async () => {
      const fetcher = new ScriptedFetcher([
        page(makePosts(1, 5), true, 5),
        page(makePosts(6, 5), false, 10),
      ]);
      const { orchestrator, checkpoints, sleep } = setup(fetcher);

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toEqual(makePosts(1, 10));
      expect(result.batches).toBe(2);
      expect(fetcher.offsets).toEqual([0, 5]);
      expect(sleep.mock.calls).toEqual([[1000]]);
      expect(await fileExists(checkpoints.path)).toBe(false);

      const snapshot = await readSnapshot(outputPath);
      expect(snapshot.count).toBe(10);
      expect(snapshot.posts.map((post) => post.id)).toEqual(
        makePosts(1, 10).map((post) => post.id)
      );
      expect(orchestrator.getState()).toBe('COMPLETE');
    });

    it('should truncate an overshooting final batch to the target count', async () => {
      const source = new InMemorySource(makePosts(1, 20));
      const { orchestrator } = setup(source, { targetCount: 7 });

      const result = await orchestrator.run();

      expect(result.posts).toEqual(makePosts(1, 7));
      expect(source.offsets).toEqual([0, 5]);
      expect((await readSnapshot(outputPath)).count).toBe(7);
    });

    it('should stop with what is available when the source has fewer posts than the target', async () => {
      const source = new InMemorySource(makePosts(1, 12));
      const { orchestrator, checkpoints } = setup(source, { targetCount: 20 });

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toHaveLength(12);
      expect(source.offsets).toEqual([0, 5, 10]);
      expect(await fileExists(checkpoints.path)).toBe(false);
    });

    it('should treat an unsuccessful response as the end of the source', async () => {
      const fetcher = new ScriptedFetcher([
        page(makePosts(1, 5), true, 5),
        { kind: 'fetched', response: { success: false, posts: makePosts(6, 5), has_more: true } },
      ]);
      const { orchestrator, checkpoints } = setup(fetcher, { targetCount: 100 });

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toEqual(makePosts(1, 5));
      expect(await fileExists(checkpoints.path)).toBe(false);
    });

    it('should treat an empty page as the end of the source', async () => {
      const fetcher = new ScriptedFetcher([
        { kind: 'fetched', response: { success: true, posts: [], has_more: true } },
      ]);
      const { orchestrator, sleep } = setup(fetcher);

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toEqual([]);
      expect(sleep).not.toHaveBeenCalled();
      expect((await readSnapshot(outputPath)).count).toBe(0);
    });

    it('should complete without fetching when the checkpoint already meets the target', async () => {
      const fetcher = new ScriptedFetcher([]);
      const { orchestrator, checkpoints } = setup(fetcher);
      await checkpoints.save(makePosts(1, 12), 15);

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.batches).toBe(0);
      expect(result.posts).toEqual(makePosts(1, 10));
      expect(fetcher.offsets).toEqual([]);
      expect(await fileExists(checkpoints.path)).toBe(false);
    });
  });

  describe('filtering', () => {
    it('should keep only posts with title and content, in fetch order', async () => {
      const fetcher = new ScriptedFetcher([
        page(
          [
            makePost(1),
            makePost(2, { title: null }),
            makePost(3),
            makePost(4, { content: null }),
            makePost(5, { author: null, upvotes: null }),
          ],
          false
        ),
      ]);
      const { orchestrator } = setup(fetcher);

      const result = await orchestrator.run();

      expect(result.posts.map((post) => post.id)).toEqual(['post-1', 'post-3', 'post-5']);
      const text = await metrics.getMetrics();
      expect(text).toContain('harvest_posts_accepted_total 3');
      expect(text).toContain('harvest_posts_rejected_total 2');
    });
  });

  describe('cursor', () => {
    it('should follow next_offset from the response', async () => {
      const fetcher = new ScriptedFetcher([
        page(makePosts(1, 5), true, 40),
        page(makePosts(6, 5), false),
      ]);
      const { orchestrator } = setup(fetcher);

      const result = await orchestrator.run();

      expect(fetcher.offsets).toEqual([0, 40]);
      expect(result.cursor).toBe(45);
    });

    it('should default to offset + batchSize when next_offset is absent', async () => {
      const fetcher = new ScriptedFetcher([page(makePosts(1, 3), true), page(makePosts(4, 3), false)]);
      const { orchestrator } = setup(fetcher);

      await orchestrator.run();

      expect(fetcher.offsets).toEqual([0, 5]);
    });

    it('should never move the cursor backwards', async () => {
      const fetcher = new ScriptedFetcher([
        page(makePosts(1, 5), true, 20),
        page(makePosts(6, 5), true, 3),
        page(makePosts(11, 5), false),
      ]);
      const warn = vi.spyOn(logger, 'warn');
      const { orchestrator } = setup(fetcher, { targetCount: 100 });

      await orchestrator.run();

      expect(fetcher.offsets).toEqual([0, 20, 25]);
      expect(warn).toHaveBeenCalledWith('Ignoring next_offset that does not advance', {
        offset: 20,
        nextOffset: 3,
        using: 25,
      });
    });
  });

  describe('failures', () => {
    it('should skip a failed window, checkpoint it, then finish on the next batch', async () => {
      const steps: BatchOutcome[] = [exhausted(), page(makePosts(1, 5), false)];
      const seen: Array<Checkpoint | null> = [];
      const reader = new CheckpointStore(outputPath, logger);
      const fetcher: BatchFetcher = {
        fetchBatch: async () => {
          seen.push(await reader.load());
          return steps.shift() ?? exhausted();
        },
      };
      const { orchestrator, checkpoints, sleep } = setup(fetcher, { targetCount: 5 });
      const save = vi.spyOn(checkpoints, 'save');

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toEqual(makePosts(1, 5));
      expect(seen[0]).toBeNull();
      expect(seen[1]).toMatchObject({ offset: 5, posts: [] });
      expect(save.mock.calls.map(([, offset]) => offset)).toEqual([5, 10]);
      expect(sleep.mock.calls).toEqual([[5000]]);
      expect(await fileExists(checkpoints.path)).toBe(false);
    });

    it('should abort after three consecutive exhausted batches and keep the checkpoint', async () => {
      const fetcher = new ScriptedFetcher([exhausted(), exhausted(), exhausted()]);
      const { orchestrator, checkpoints, sleep } = setup(fetcher);

      const result = await orchestrator.run();

      expect(result.state).toBe('ABORTED');
      expect(result.posts).toEqual([]);
      expect(result.cursor).toBe(15);
      expect(fetcher.offsets).toEqual([0, 5, 10]);
      expect(sleep.mock.calls).toEqual([[5000], [5000]]);
      expect(orchestrator.getState()).toBe('ABORTED');

      const raw = await readJson(checkpoints.path);
      expect(raw).toMatchObject({ offset: 15, posts: [] });
      const fresh = await new CheckpointStore(outputPath, logger).load();
      expect(fresh?.offset).toBe(15);
      expect((await readSnapshot(outputPath)).count).toBe(0);
    });

    it('should record checkpoint and skip events on the active span', async () => {
      const fetcher = new ScriptedFetcher([exhausted(), page(makePosts(1, 5), false)]);
      const { orchestrator } = setup(fetcher, { targetCount: 5 });

      await orchestrator.run();

      expect(vi.mocked(addSpanEvent).mock.calls).toEqual([
        ['checkpoint.saved', { offset: 5, posts: 0 }],
        ['batch.skipped', { offset: 0, consecutiveFailures: 1 }],
        ['checkpoint.saved', { offset: 10, posts: 5 }],
      ]);
    });

    it('should tell the user to re-run when aborting', async () => {
      const warn = vi.spyOn(logger, 'warn');
      const fetcher = new ScriptedFetcher([exhausted(), exhausted(), exhausted()]);
      const { orchestrator, checkpoints } = setup(fetcher);

      await orchestrator.run();

      expect(warn).toHaveBeenCalledWith(
        'Too many consecutive failures. Run again to resume from checkpoint.',
        { consecutiveFailures: 3, posts: 0, checkpoint: checkpoints.path }
      );
    });

    it('should reset the failure count after a successful batch', async () => {
      const fetcher = new ScriptedFetcher([
        exhausted(),
        exhausted(),
        page(makePosts(1, 5), true, 15),
        exhausted(),
        exhausted(),
        page(makePosts(6, 5), false, 35),
      ]);
      const { orchestrator } = setup(fetcher, { targetCount: 100 });

      const result = await orchestrator.run();

      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toHaveLength(10);
      expect(fetcher.offsets).toEqual([0, 5, 10, 15, 20, 25]);
      expect(fetcher.remaining).toBe(0);
    });

    it('should honour a configured failure threshold', async () => {
      const fetcher = new ScriptedFetcher([exhausted()]);
      const { orchestrator } = setup(fetcher, { maxConsecutiveFailures: 1 });

      const result = await orchestrator.run();

      expect(result.state).toBe('ABORTED');
      expect(result.cursor).toBe(5);
    });
  });

  describe('resume', () => {
    it('should continue from the checkpoint offset without duplicating posts', async () => {
      const source = new InMemorySource(makePosts(1, 20));
      const { orchestrator, checkpoints } = setup(source);
      await checkpoints.save(makePosts(1, 5), 5);

      const result = await orchestrator.run();

      expect(source.offsets).toEqual([5]);
      expect(result.posts).toEqual(makePosts(1, 10));
    });

    it('should ignore the checkpoint when resume is disabled', async () => {
      const source = new InMemorySource(makePosts(1, 20));
      const { orchestrator, checkpoints } = setup(source, { resume: false });
      await checkpoints.save(makePosts(100, 5), 500);

      const result = await orchestrator.run();

      expect(source.offsets[0]).toBe(0);
      expect(result.posts).toEqual(makePosts(1, 10));
    });

    it('should start fresh when the checkpoint is corrupted', async () => {
      const source = new InMemorySource(makePosts(1, 20));
      const { orchestrator, checkpoints } = setup(source);
      await fs.writeFile(checkpoints.path, 'not json', 'utf8');

      const result = await orchestrator.run();

      expect(source.offsets[0]).toBe(0);
      expect(result.posts).toHaveLength(10);
    });

    it('should resume an aborted run from where it stopped', async () => {
      const first = new ScriptedFetcher([
        page(makePosts(1, 5), true, 5),
        exhausted(),
        exhausted(),
        exhausted(),
      ]);
      const aborted = await setup(first).orchestrator.run();
      expect(aborted.state).toBe('ABORTED');
      expect(aborted.posts).toEqual(makePosts(1, 5));

      const second = new ScriptedFetcher([page(makePosts(6, 5), false)]);
      const { orchestrator, checkpoints } = setup(second);
      const result = await orchestrator.run();

      expect(second.offsets).toEqual([20]);
      expect(result.state).toBe('COMPLETE');
      expect(result.posts).toEqual(makePosts(1, 10));
      expect(await fileExists(checkpoints.path)).toBe(false);
    });

    it('should produce the same collection after a crash and resume as an uninterrupted run', async () => {
      const posts = makePosts(1, 23);

      const crashing = new InMemorySource(posts, { crashAtCall: 2 });
      await expect(setup(crashing, { targetCount: 20 }).orchestrator.run()).rejects.toThrow(
        'simulated crash'
      );
      const checkpoint = await new CheckpointStore(outputPath, logger).load();
      expect(checkpoint?.offset).toBe(10);
      expect(checkpoint?.posts).toHaveLength(10);

      const resumed = await setup(new InMemorySource(posts), { targetCount: 20 }).orchestrator.run();

      const uninterruptedDir = await makeTempDir();
      try {
        outputPath = path.join(uninterruptedDir, 'posts.json');
        const uninterrupted = await setup(new InMemorySource(posts), {
          targetCount: 20,
        }).orchestrator.run();

        expect(resumed.posts).toEqual(uninterrupted.posts);
        expect(new Set(resumed.posts.map((post) => post.id)).size).toBe(20);
      } finally {
        await removeTempDir(uninterruptedDir);
      }
    });
  });
});
