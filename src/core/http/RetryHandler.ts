// src/core/http/RetryHandler.ts

import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import {
  ApiError,
  NetworkError,
  ProtocolError,
  RetryExhaustedError,
  describeError,
} from '../../utils/errors';
import { sleep } from '../../utils/time';

export function isTransientError(error: unknown): error is Error {
  return (
    error instanceof NetworkError || error instanceof ApiError || error instanceof ProtocolError
  );
}

/**
 * Runs a task up to `maxRetries` times with pure exponential backoff:
 * `baseDelay * 2^attempt` between attempts, no jitter and no cap.
 */
export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {}

  delayFor(attempt: number): number {
    return this.config.baseDelay * Math.pow(2, attempt);
  }

  /**
   * @throws {RetryExhaustedError} Once every attempt failed with a transient error
   */
  async execute<T>(task: () => Promise<T>, label: string): Promise<T> {
    const { maxRetries } = this.config;
    let lastError: Error | undefined;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        const result = await task();
        this.metrics?.incrementCounter('fetch_attempts_total', { status: 'success' });
        return result;
      } catch (error: unknown) {
        if (!isTransientError(error)) {
          throw error;
        }
        lastError = error;
        this.metrics?.incrementCounter('fetch_attempts_total', { status: 'failed' });

        this.logger.warn(`Attempt ${attempt + 1}/${maxRetries} failed`, {
          label,
          error: describeError(error),
        });

        if (attempt < maxRetries - 1) {
          const delay = this.delayFor(attempt);
          this.logger.info('Retrying request', { label, attempt: attempt + 1, delay });
          await sleep(delay);
        }
      }
    }

    this.logger.warn(`Failed after ${maxRetries} attempts`, { label });
    throw new RetryExhaustedError(
      `Failed after ${maxRetries} attempts`,
      maxRetries,
      lastError ?? new Error('No attempts were made'),
      { label }
    );
  }
}
