// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpCoreConfig, HttpRequestConfig, HttpResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import {
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private retryHandler: RetryHandler;
  private logger: Logger;

  constructor(
    private config: HttpCoreConfig,
    metrics: MetricsCollector,
    logger: Logger
  ) {
    this.logger = logger;
    this.retryHandler = new RetryHandler(config.retry, logger, metrics);

    this.axiosInstance = axios.create({
      timeout: config.timeout,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });
  }

  async get<T>(
    url: string,
    config: Omit<HttpRequestConfig<T>, 'url' | 'method'>
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  /**
   * Request with retry. Every attempt is one traced HTTP call followed by
   * `parse` on the body.
   *
   * @throws {RetryExhaustedError} If every attempt failed
   */
  async request<T>(config: HttpRequestConfig<T>): Promise<HttpResponse<T>> {
    const requestId = this.generateRequestId();
    const method = config.method ?? 'GET';

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
      ...config.headers,
    };

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url,
      method,
      query: config.query,
      headers,
    });

    return this.retryHandler.execute(
      () =>
        withHttpSpan(method, config.url, async () => {
          const response = await this.send(config, headers);
          return {
            data: config.parse(response.data),
            status: response.status,
            headers: response.headers,
          };
        }),
      `${method} ${config.url}`
    );
  }

  private async send<T>(
    config: HttpRequestConfig<T>,
    headers: Record<string, string>
  ): Promise<HttpResponse<unknown>> {
    try {
      const axiosResponse = await this.axiosInstance.request<unknown>({
        url: config.url,
        method: config.method ?? 'GET',
        headers,
        params: config.query,
        timeout: config.timeout,
      });

      return {
        data: axiosResponse.data,
        status: axiosResponse.status,
        headers: this.toHeaderRecord(axiosResponse.headers),
      };
    } catch (error: unknown) {
      throw this.transformError(error, config.url);
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (!axios.isAxiosError(error)) {
      return new NetworkError('Network error', {
        url,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const retryAfter = Number.parseInt(String(error.response.headers['retry-after']), 10);
        return new RateLimitError(
          'Rate limit exceeded',
          Number.isNaN(retryAfter) ? undefined : retryAfter,
          { url }
        );
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, { url });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { url });
      }
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { url, timeout: this.config.timeout });
    }
    return new NetworkError('Network error', { url, code: error.code, cause: error.message });
  }
}
