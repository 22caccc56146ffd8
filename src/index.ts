// src/index.ts

export { Harvester } from './harvester';
export {
  validateConfig,
  validateConfigSafe,
  configFromEnv,
  HarvestConfigSchema,
} from './config/ConfigValidator';
export type { HarvestConfig, HarvestConfigInput } from './config/ConfigValidator';
export { HarvestOrchestrator } from './core/harvest/HarvestOrchestrator';
export type {
  HarvestState,
  HarvestResult,
  OrchestratorConfig,
  OrchestratorDeps,
} from './core/harvest/HarvestOrchestrator';
export { PostsFetcher } from './core/harvest/PostsFetcher';
export type { BatchFetcher, BatchOutcome } from './core/harvest/PostsFetcher';
export { isValidPost } from './core/harvest/PostValidator';
export { CheckpointStore, checkpointPathFor } from './core/storage/CheckpointStore';
export { OutputWriter } from './core/storage/OutputWriter';
export { readSnapshot, postUrl } from './core/storage/SnapshotReader';
export type {
  HarvestedPost,
  Post,
  Checkpoint,
  OutputSnapshot,
  BatchResponse,
} from './core/records/types';

// Export error classes for error handling
export {
  HarvestError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  ProtocolError,
  NetworkError,
  NetworkTimeoutError,
  RetryExhaustedError,
  CheckpointError,
  SnapshotFormatError,
} from './utils/errors';
