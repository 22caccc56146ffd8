// src/core/harvest/HarvestOrchestrator.ts

import type { BatchFetcher } from './PostsFetcher';
import type { HarvestedPost } from '../records/types';
import type { CheckpointStore } from '../storage/CheckpointStore';
import type { OutputWriter } from '../storage/OutputWriter';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { addSpanEvent, withBatchSpan } from '../../observability/tracing';
import { sleep as defaultSleep } from '../../utils/time';
import { isValidPost } from './PostValidator';

/**
 * RUNNING: last batch succeeded. DEGRADED: one or more batches in a row
 * exhausted their retries. ABORTED and COMPLETE are terminal.
 */
export type HarvestState = 'RUNNING' | 'DEGRADED' | 'ABORTED' | 'COMPLETE';

export interface OrchestratorConfig {
  targetCount: number;
  batchSize: number;
  resume: boolean;
  successPause: number; // ms between pages
  failurePause: number; // ms after a skipped batch
  maxConsecutiveFailures: number;
}

export interface OrchestratorDeps {
  fetcher: BatchFetcher;
  checkpoints: CheckpointStore;
  output: OutputWriter;
  logger: Logger;
  metrics: MetricsCollector;
  sleep?: (ms: number) => Promise<void>;
}

export interface HarvestResult {
  state: Extract<HarvestState, 'ABORTED' | 'COMPLETE'>;
  posts: HarvestedPost[];
  batches: number;
  /** Next offset that would have been requested */
  cursor: number;
  outputPath: string;
  checkpointPath: string;
}

export class HarvestOrchestrator {
  private state: HarvestState = 'RUNNING';
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private config: OrchestratorConfig,
    private deps: OrchestratorDeps
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  getState(): HarvestState {
    return this.state;
  }

  async run(): Promise<HarvestResult> {
    const { targetCount, batchSize } = this.config;
    const { fetcher, logger, metrics } = this.deps;

    const checkpoint = this.config.resume ? await this.deps.checkpoints.load() : null;
    const posts: HarvestedPost[] = checkpoint ? [...checkpoint.posts] : [];
    let cursor = checkpoint?.offset ?? 0;
    let consecutiveFailures = 0;
    let batch = 0;
    this.state = 'RUNNING';

    logger.info('Harvest started', {
      targetCount,
      batchSize,
      output: this.deps.output.path,
      resumedPosts: posts.length,
      offset: cursor,
    });

    while (posts.length < targetCount) {
      batch += 1;
      const offset = cursor;
      logger.info('Fetching batch', { batch, offset });

      const startTime = Date.now();
      const outcome = await withBatchSpan(batch, offset, () =>
        fetcher.fetchBatch(offset, batchSize)
      );

      if (outcome.kind === 'exhausted') {
        consecutiveFailures += 1;
        this.state = 'DEGRADED';
        metrics.incrementCounter('batches_total', { outcome: 'exhausted' });
        metrics.recordLatency('batch_duration', Date.now() - startTime, { outcome: 'exhausted' });

        // Skip the failed window so one bad page cannot stall the run
        cursor = offset + batchSize;
        await this.persist(posts, cursor);

        if (consecutiveFailures >= this.config.maxConsecutiveFailures) {
          this.state = 'ABORTED';
          logger.warn('Too many consecutive failures. Run again to resume from checkpoint.', {
            consecutiveFailures,
            posts: posts.length,
            checkpoint: this.deps.checkpoints.path,
          });
          return this.result(posts, batch, cursor);
        }

        addSpanEvent('batch.skipped', { offset, consecutiveFailures });
        logger.warn('Batch skipped after exhausting retries', {
          batch,
          offset,
          consecutiveFailures,
          nextOffset: cursor,
        });
        await this.sleep(this.config.failurePause);
        continue;
      }

      consecutiveFailures = 0;
      this.state = 'RUNNING';
      const { response } = outcome;

      if (!response.success || response.posts.length === 0) {
        metrics.incrementCounter('batches_total', { outcome: 'source_exhausted' });
        logger.info('No more posts available', { batch, offset });
        break;
      }

      const accepted = response.posts.filter(isValidPost);
      posts.push(...accepted);
      metrics.incrementCounter('batches_total', { outcome: 'fetched' });
      metrics.incrementCounter('posts_accepted', {}, accepted.length);
      metrics.incrementCounter('posts_rejected', {}, response.posts.length - accepted.length);
      metrics.recordGauge('collection_size', posts.length);
      metrics.recordLatency('batch_duration', Date.now() - startTime, { outcome: 'fetched' });
      logger.info('Batch accepted', { batch, accepted: accepted.length, total: posts.length });

      cursor = this.nextCursor(offset, response.next_offset);
      await this.persist(posts, cursor);

      if (!response.has_more) {
        break;
      }
      await this.sleep(this.config.successPause);
    }

    return this.complete(posts, batch, cursor);
  }

  /**
   * An offset that does not move past the current page is ignored in favour
   * of `offset + batchSize`, which keeps the cursor strictly advancing.
   */
  private nextCursor(offset: number, nextOffset: number | undefined): number {
    const fallback = offset + this.config.batchSize;
    if (nextOffset === undefined) {
      return fallback;
    }
    if (nextOffset <= offset) {
      this.deps.logger.warn('Ignoring next_offset that does not advance', {
        offset,
        nextOffset,
        using: fallback,
      });
      return fallback;
    }
    return nextOffset;
  }

  private async persist(posts: readonly HarvestedPost[], cursor: number): Promise<void> {
    await this.deps.checkpoints.save(posts, cursor);
    await this.deps.output.write(posts);
    addSpanEvent('checkpoint.saved', { offset: cursor, posts: posts.length });
  }

  private async complete(
    posts: HarvestedPost[],
    batches: number,
    cursor: number
  ): Promise<HarvestResult> {
    const final = posts.slice(0, this.config.targetCount);
    await this.deps.output.write(final);
    await this.deps.checkpoints.clear();
    this.state = 'COMPLETE';
    this.deps.metrics.recordGauge('collection_size', final.length);

    this.deps.logger.info(`Done! Saved ${final.length} posts to ${this.deps.output.path}`, {
      count: final.length,
      batches,
    });
    return this.result(final, batches, cursor);
  }

  private result(posts: HarvestedPost[], batches: number, cursor: number): HarvestResult {
    return {
      state: this.state === 'ABORTED' ? 'ABORTED' : 'COMPLETE',
      posts,
      batches,
      cursor,
      outputPath: this.deps.output.path,
      checkpointPath: this.deps.checkpoints.path,
    };
  }
}
