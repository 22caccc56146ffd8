// src/core/harvest/PostsFetcher.ts

import type { HttpCore } from '../http/HttpCore';
import type { BatchResponse } from '../records/types';
import { parseBatchResponse } from '../records/schemas';
import type { Logger } from '../../observability/Logger';
import { RetryExhaustedError } from '../../utils/errors';

export type BatchOutcome =
  | { kind: 'fetched'; response: BatchResponse }
  | { kind: 'exhausted'; attempts: number; cause: Error };

export interface BatchFetcher {
  fetchBatch(offset: number, limit: number): Promise<BatchOutcome>;
}

/**
 * Reads one page of top posts: `GET <apiBase>/posts?sort=top&limit=&offset=`.
 *
 * Transient failures are retried by HttpCore; running out of attempts comes
 * back as an `exhausted` outcome rather than an exception.
 */
export class PostsFetcher implements BatchFetcher {
  private readonly postsUrl: string;

  constructor(
    private http: HttpCore,
    apiBase: string,
    private logger: Logger
  ) {
    this.postsUrl = `${apiBase.replace(/\/+$/, '')}/posts`;
  }

  async fetchBatch(offset: number, limit: number): Promise<BatchOutcome> {
    try {
      const response = await this.http.get(this.postsUrl, {
        query: { sort: 'top', limit, offset },
        parse: parseBatchResponse,
      });
      return { kind: 'fetched', response: response.data };
    } catch (error: unknown) {
      if (error instanceof RetryExhaustedError) {
        this.logger.error('Batch fetch exhausted retries', {
          offset,
          limit,
          attempts: error.attempts,
          error: error.lastError.message,
        });
        return { kind: 'exhausted', attempts: error.attempts, cause: error.lastError };
      }
      throw error;
    }
  }
}
