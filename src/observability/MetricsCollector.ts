// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

// Ports tried past the configured one before giving up
const MAX_PORT_ATTEMPTS = 10;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        const lastPort = Math.min(config.port + MAX_PORT_ATTEMPTS, 65535);
        this.exposeMetrics(config.port, config.path ?? '/metrics', lastPort);
      }
    }
  }

  private initializeMetrics(): void {
    this.counters.set(
      'batches_total',
      new Counter({
        name: 'harvest_batches_total',
        help: 'Harvest batches by outcome',
        labelNames: ['outcome'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'fetch_attempts_total',
      new Counter({
        name: 'harvest_fetch_attempts_total',
        help: 'Remote fetch attempts',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'posts_accepted',
      new Counter({
        name: 'harvest_posts_accepted_total',
        help: 'Posts that passed validation',
        registers: [this.registry],
      })
    );

    this.counters.set(
      'posts_rejected',
      new Counter({
        name: 'harvest_posts_rejected_total',
        help: 'Posts dropped for a missing title or content',
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'collection_size',
      new Gauge({
        name: 'harvest_collection_size',
        help: 'Posts held in the current collection',
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'batch_duration',
      new Histogram({
        name: 'harvest_batch_duration_seconds',
        help: 'Wall time of one batch including retries',
        labelNames: ['outcome'],
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string, lastPort: number): void {
    const server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger?.error('Metrics render failed', {
            error: error instanceof Error ? error.message : String(error),
          });
          res.statusCode = 500;
          res.end();
        });
    });
    this.server = server;

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE' && port < lastPort) {
        this.logger?.warn(`Port ${port} in use, trying next available port`);
        server.close();
        this.exposeMetrics(port + 1, path, lastPort);
        return;
      }
      this.logger?.error('MetricsCollector server error', { error: error.message });
    });

    server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
