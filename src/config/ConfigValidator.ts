// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const DEFAULT_API_BASE = 'https://www.moltbook.com/api/v1';
export const DEFAULT_SOURCE_LABEL = 'moltbook.com';
export const DEFAULT_DESCRIPTION =
  'Top posts from Moltbook - the first social network for AI agents';

// Remote source and output envelope
const SourceConfigSchema = z
  .object({
    apiBase: z.string().url().default(DEFAULT_API_BASE),
    label: z.string().min(1).default(DEFAULT_SOURCE_LABEL),
    description: z.string().default(DEFAULT_DESCRIPTION),
    userAgent: z.string().min(1).default('post-harvester/1.0'),
  })
  .default({});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['json', 'pretty']).default('pretty'),
  })
  .default({});

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

export const HarvestConfigSchema = z.object({
  targetCount: z.coerce.number().int().min(1, 'targetCount must be at least 1').default(500),
  outputPath: z.string().min(1).default('moltbook_posts.json'),
  batchSize: z.coerce
    .number()
    .int()
    .min(1)
    .max(100, 'batchSize must be at most 100')
    .default(25),
  maxRetries: z.coerce.number().int().min(1, 'maxRetries must be at least 1').max(10).default(5),
  baseDelay: z.coerce.number().min(0).default(3000),
  requestTimeout: z.coerce.number().positive().default(60000),
  resume: z.boolean().default(true),
  successPause: z.number().min(0).default(1000),
  failurePause: z.number().min(0).default(5000),
  maxConsecutiveFailures: z.number().int().min(1).default(3),
  source: SourceConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type HarvestConfigInput = z.input<typeof HarvestConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Validate harvest configuration and apply defaults
 *
 * @throws {ConfigError} If configuration is invalid, listing every issue
 */
export function validateConfig(config: unknown): HarvestConfig {
  const result = HarvestConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid harvest configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function validateConfigSafe(
  config: unknown
): { success: true; data: HarvestConfig } | { success: false; errors: string[] } {
  const result = HarvestConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Build raw configuration from environment variables. Only variables that
 * are set are copied; numeric strings are coerced by the schema.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const source: Record<string, unknown> = {};

  const numeric: Array<[string, string]> = [
    ['HARVEST_COUNT', 'targetCount'],
    ['HARVEST_BATCH_SIZE', 'batchSize'],
    ['HARVEST_MAX_RETRIES', 'maxRetries'],
    ['HARVEST_RETRY_DELAY_MS', 'baseDelay'],
  ];
  for (const [variable, key] of numeric) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      config[key] = value;
    }
  }

  if (env.HARVEST_OUTPUT) config.outputPath = env.HARVEST_OUTPUT;
  if (env.HARVEST_NO_RESUME !== undefined) config.resume = !isTruthyFlag(env.HARVEST_NO_RESUME);
  if (env.HARVEST_API_BASE) source.apiBase = env.HARVEST_API_BASE;
  if (Object.keys(source).length > 0) config.source = source;

  if (env.LOG_LEVEL) {
    config.logging = { level: env.LOG_LEVEL, format: env.LOG_FORMAT ?? 'pretty' };
  }

  return config;
}
