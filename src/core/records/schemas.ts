// src/core/records/schemas.ts

import { z } from 'zod';
import { ProtocolError } from '../../utils/errors';

const HarvestedPostSchema = z.record(z.string(), z.unknown());

const PresentSchema = z
  .unknown()
  .refine((value) => value !== null && value !== undefined, 'Required');

const IdSchema = z.union([z.string(), z.number()]).nullable().optional();

/**
 * Shape downstream consumers rely on. Only the two text fields gate a post;
 * everything else may be null or missing, as the API sends it.
 */
export const PostSchema = z
  .object({
    id: IdSchema,
    title: PresentSchema,
    content: PresentSchema,
    author: z
      .object({ id: IdSchema, name: z.string().nullable().optional() })
      .passthrough()
      .nullable()
      .optional(),
    submolt: z
      .object({
        id: IdSchema,
        name: z.string().nullable().optional(),
        display_name: z.string().nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    upvotes: z.number().nullable().optional(),
    downvotes: z.number().nullable().optional(),
    comment_count: z.number().nullable().optional(),
    created_at: z.string().nullable().optional(),
  })
  .passthrough();

export const CheckpointSchema = z.object({
  offset: z.number().int().nonnegative(),
  posts: z.array(HarvestedPostSchema),
  timestamp: z.string().optional(),
});

// Exported for JSON Schema generation
export const OutputSnapshotSchema = z.object({
  source: z.string(),
  description: z.string(),
  count: z.number().int().nonnegative(),
  scraped_at: z.string(),
  posts: z.array(PostSchema),
});

// Flags are read by truthiness; a missing flag reads as "no"
const TruthySchema = z.unknown().transform((value) => Boolean(value));

const BatchResponseSchema = z.object({
  success: TruthySchema,
  posts: z.array(z.unknown()).catch([]),
  has_more: TruthySchema,
  next_offset: z.number().int().nonnegative().optional().catch(undefined),
});

export type BatchResponse = z.infer<typeof BatchResponseSchema>;

/**
 * Parse a `/posts` response body.
 *
 * @throws {ProtocolError} If the body is not a JSON object
 */
export function parseBatchResponse(data: unknown): BatchResponse {
  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ProtocolError('Response body is not a JSON object', {
      received: Array.isArray(data) ? 'array' : typeof data,
    });
  }
  return BatchResponseSchema.parse(data);
}
