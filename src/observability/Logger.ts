// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = ['apiKey', 'authorization', 'cookie'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(meta: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...meta };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Request headers travel nested under `headers`
    const headers = redacted.headers;
    if (headers && typeof headers === 'object' && !Array.isArray(headers)) {
      const copy: Record<string, unknown> = { ...headers };
      for (const key of Object.keys(copy)) {
        if (SENSITIVE_KEYS.some((sensitive) => sensitive.toLowerCase() === key.toLowerCase())) {
          copy[key] = '[REDACTED]';
        }
      }
      redacted.headers = copy;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  log(level: string, message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.log(level, message, sanitized);
  }
}
