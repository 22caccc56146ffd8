// src/utils/errors.ts

export class HarvestError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends HarvestError {
  constructor(
    message: string,
    public issues: string[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', { ...details, issues });
  }
}

// API errors
export class ApiError extends HarvestError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    /** Seconds from the Retry-After header. Informational: backoff ignores it */
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

export class ProtocolError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', details);
  }
}

// Network errors
export class NetworkError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class RetryExhaustedError extends HarvestError {
  constructor(
    message: string,
    public attempts: number,
    public lastError: Error,
    details?: Record<string, unknown>
  ) {
    super(message, 'RETRY_EXHAUSTED', { ...details, attempts, cause: lastError.message });
  }
}

// Storage errors
export class CheckpointError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CHECKPOINT_ERROR', details);
  }
}

export class SnapshotFormatError extends HarvestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SNAPSHOT_FORMAT_ERROR', details);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
