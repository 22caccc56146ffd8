// src/core/harvest/PostValidator.ts

import type { HarvestedPost } from '../records/types';

/**
 * A post is usable when both `title` and `content` are present and not
 * null. No other field is consulted.
 */
export function isValidPost(post: unknown): post is HarvestedPost {
  if (!post || typeof post !== 'object' || Array.isArray(post)) {
    return false;
  }
  const title = 'title' in post ? post.title : undefined;
  const content = 'content' in post ? post.content : undefined;
  return title !== undefined && title !== null && content !== undefined && content !== null;
}
