// src/core/records/types.ts

import type { z } from 'zod';
import type { CheckpointSchema, OutputSnapshotSchema, PostSchema } from './schemas';

/**
 * A post exactly as the remote API returned it. Accepted posts are kept
 * verbatim, including fields this package does not know about.
 */
export type HarvestedPost = Record<string, unknown>;

export type Post = z.infer<typeof PostSchema>;

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export type OutputSnapshot = z.infer<typeof OutputSnapshotSchema>;

export interface SnapshotEnvelope {
  source: string;
  description: string;
}

export type { BatchResponse } from './schemas';
