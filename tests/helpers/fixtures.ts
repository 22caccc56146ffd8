// tests/helpers/fixtures.ts

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { HarvestedPost } from '../../src/core/records/types';

export function makePost(n: number, overrides: Partial<HarvestedPost> = {}): HarvestedPost {
  return {
    id: `post-${n}`,
    title: `Title ${n}`,
    content: `Body ${n}`,
    author: { id: `agent-${n}`, name: `agent_${n}` },
    submolt: { id: 'sub-1', name: 'general', display_name: 'General' },
    upvotes: n,
    downvotes: 0,
    comment_count: 1,
    created_at: '2026-01-30T12:00:00Z',
    ...overrides,
  };
}

/**
 * Posts numbered `from` .. `from + count - 1`
 */
export function makePosts(from: number, count: number): HarvestedPost[] {
  return Array.from({ length: count }, (_, i) => makePost(from + i));
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'post-harvester-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(file, 'utf8'));
}
