// src/harvester.ts

import { promises as fs } from 'fs';
import * as path from 'path';
import { validateConfig } from './config/ConfigValidator';
import type { HarvestConfig } from './config/ConfigValidator';
import { HttpCore } from './core/http/HttpCore';
import { PostsFetcher } from './core/harvest/PostsFetcher';
import { HarvestOrchestrator } from './core/harvest/HarvestOrchestrator';
import type { HarvestResult, HarvestState } from './core/harvest/HarvestOrchestrator';
import { CheckpointStore } from './core/storage/CheckpointStore';
import { OutputWriter } from './core/storage/OutputWriter';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateRunId, withRunSpan } from './observability/tracing';

export class Harvester {
  private orchestrator: HarvestOrchestrator;
  private logger: Logger;
  private metrics: MetricsCollector;

  readonly outputPath: string;
  readonly checkpointPath: string;

  private constructor(private config: HarvestConfig) {
    // Build every dependency before wiring the orchestrator
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const http = new HttpCore(
      {
        timeout: config.requestTimeout,
        userAgent: config.source.userAgent,
        retry: { maxRetries: config.maxRetries, baseDelay: config.baseDelay },
      },
      metrics,
      logger
    );
    const fetcher = new PostsFetcher(http, config.source.apiBase, logger);
    const checkpoints = new CheckpointStore(config.outputPath, logger);
    const output = new OutputWriter(
      config.outputPath,
      { source: config.source.label, description: config.source.description },
      logger
    );

    this.logger = logger;
    this.metrics = metrics;
    this.outputPath = output.path;
    this.checkpointPath = checkpoints.path;
    this.orchestrator = new HarvestOrchestrator(
      {
        targetCount: config.targetCount,
        batchSize: config.batchSize,
        resume: config.resume,
        successPause: config.successPause,
        failurePause: config.failurePause,
        maxConsecutiveFailures: config.maxConsecutiveFailures,
      },
      { fetcher, checkpoints, output, logger, metrics }
    );
  }

  /**
   * Validate configuration and prepare a harvester.
   *
   * Creates the output directory if needed.
   *
   * @throws {ConfigError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const harvester = await Harvester.init({ targetCount: 100, outputPath: 'posts.json' });
   * const result = await harvester.run();
   * if (result.state === 'ABORTED') {
   *   console.log('Run again to resume from', result.checkpointPath);
   * }
   * ```
   */
  static async init(config: unknown): Promise<Harvester> {
    const validated = validateConfig(config);
    await fs.mkdir(path.dirname(path.resolve(validated.outputPath)), { recursive: true });

    const harvester = new Harvester(validated);
    harvester.logger.debug('Harvester initialized', {
      apiBase: validated.source.apiBase,
      output: harvester.outputPath,
      checkpoint: harvester.checkpointPath,
    });
    return harvester;
  }

  /**
   * Harvest until the target count is reached, the source runs dry, or too
   * many batches in a row fail. An aborted run leaves its checkpoint behind
   * for the next invocation.
   */
  async run(): Promise<HarvestResult> {
    const runId = generateRunId();
    this.logger.info('Harvest run', { runId, targetCount: this.config.targetCount });
    return withRunSpan(runId, this.config.targetCount, () => this.orchestrator.run());
  }

  getState(): HarvestState {
    return this.orchestrator.getState();
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.metrics.close();
  }
}
