// src/core/storage/CheckpointStore.ts

import { promises as fs } from 'fs';
import type { Checkpoint, HarvestedPost } from '../records/types';
import { CheckpointSchema } from '../records/schemas';
import type { Logger } from '../../observability/Logger';
import { CheckpointError, describeError } from '../../utils/errors';
import { utcTimestamp } from '../../utils/time';
import { isMissingFile, writeJsonAtomic } from './atomicWrite';

/**
 * Checkpoint file for an output file: `posts.json` -> `posts_checkpoint.json`
 */
export function checkpointPathFor(outputPath: string): string {
  if (!outputPath.includes('.json')) {
    return `${outputPath}_checkpoint.json`;
  }
  return outputPath.split('.json').join('_checkpoint.json');
}

/**
 * Crash-recovery state of one harvest: the collection so far and the next
 * offset to request.
 */
export class CheckpointStore {
  readonly path: string;

  constructor(
    outputPath: string,
    private logger: Logger
  ) {
    this.path = checkpointPathFor(outputPath);
  }

  /**
   * Load the checkpoint, or null when there is none to resume from.
   *
   * A file that cannot be read or parsed is reported and ignored so that a
   * damaged checkpoint never blocks a fresh run.
   */
  async load(): Promise<Checkpoint | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf8');
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        return null;
      }
      this.logger.warn('Checkpoint unreadable, starting fresh', {
        path: this.path,
        error: describeError(error),
      });
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      this.logger.warn('Checkpoint corrupted, starting fresh', {
        path: this.path,
        error: describeError(error),
      });
      return null;
    }

    const result = CheckpointSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Checkpoint corrupted, starting fresh', {
        path: this.path,
        errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
      return null;
    }

    this.logger.info('Resuming from checkpoint', {
      posts: result.data.posts.length,
      offset: result.data.offset,
    });
    return result.data;
  }

  async save(posts: readonly HarvestedPost[], offset: number): Promise<void> {
    const checkpoint: Checkpoint = {
      offset,
      posts: [...posts],
      timestamp: utcTimestamp(),
    };

    try {
      await writeJsonAtomic(this.path, checkpoint);
    } catch (error: unknown) {
      throw new CheckpointError('Failed to save checkpoint', {
        path: this.path,
        offset,
        cause: describeError(error),
      });
    }

    this.logger.debug('Checkpoint saved', { path: this.path, offset, posts: posts.length });
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.path, { force: true });
    } catch (error: unknown) {
      throw new CheckpointError('Failed to remove checkpoint', {
        path: this.path,
        cause: describeError(error),
      });
    }
  }
}
