// src/core/http/types.ts

export interface HttpRequestConfig<T> {
  url: string;
  method?: 'GET';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  timeout?: number;
  /**
   * Turns the raw body into T. Runs inside the retry loop, so a body it
   * rejects with a ProtocolError is retried like a network failure.
   */
  parse: (data: unknown) => T;
}

export interface HttpResponse<T> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RetryConfig {
  maxRetries: number; // Total attempts, including the first
  baseDelay: number; // milliseconds
}

export interface HttpCoreConfig {
  timeout: number; // Per attempt, milliseconds
  userAgent: string;
  retry: RetryConfig;
}
