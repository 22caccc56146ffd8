// src/core/storage/SnapshotReader.ts

import { promises as fs } from 'fs';
import type { OutputSnapshot } from '../records/types';
import { OutputSnapshotSchema } from '../records/schemas';
import { SnapshotFormatError, describeError } from '../../utils/errors';

export const DEFAULT_WEB_ROOT = 'https://www.moltbook.com';

/**
 * Read an output artifact the way downstream uploaders consume it.
 *
 * @throws {SnapshotFormatError} If the file is not valid JSON or does not
 * match the output snapshot shape
 */
export async function readSnapshot(path: string): Promise<OutputSnapshot> {
  const raw = await fs.readFile(path, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new SnapshotFormatError('Output snapshot is not valid JSON', {
      path,
      cause: describeError(error),
    });
  }

  const result = OutputSnapshotSchema.safeParse(parsed);
  if (!result.success) {
    throw new SnapshotFormatError('Output snapshot does not match the expected shape', {
      path,
      errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
  }
  return result.data;
}

/**
 * Canonical web URL of a post
 */
export function postUrl(id: string | number, webRoot: string = DEFAULT_WEB_ROOT): string {
  return `${webRoot.replace(/\/+$/, '')}/post/${id}`;
}
