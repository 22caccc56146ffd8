// src/core/storage/atomicWrite.ts

import { promises as fs } from 'fs';

/**
 * Write `value` as pretty-printed JSON so that readers only ever see the
 * previous file or the complete new one.
 *
 * The payload goes to a sibling temp file which is flushed, closed and then
 * renamed over `path`. rename() is atomic within one filesystem.
 */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  const payload = JSON.stringify(value, null, 2);
  const tempPath = `${path}.tmp.${process.pid}`;

  try {
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(payload, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, path);
  } catch (error: unknown) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
