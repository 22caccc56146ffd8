// src/core/storage/OutputWriter.ts

import type { HarvestedPost, SnapshotEnvelope } from '../records/types';
import type { Logger } from '../../observability/Logger';
import { utcTimestamp } from '../../utils/time';
import { writeJsonAtomic } from './atomicWrite';

export class OutputWriter {
  constructor(
    readonly path: string,
    private envelope: SnapshotEnvelope,
    private logger: Logger
  ) {}

  /**
   * Overwrite the output artifact with the full collection
   */
  async write(posts: readonly HarvestedPost[]): Promise<void> {
    await writeJsonAtomic(this.path, {
      source: this.envelope.source,
      description: this.envelope.description,
      count: posts.length,
      scraped_at: utcTimestamp(),
      posts,
    });

    this.logger.debug('Output snapshot written', { path: this.path, count: posts.length });
  }
}
