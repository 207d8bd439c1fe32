import { promises as fs } from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';

import { DocPublishError } from '../core/error-codes.js';
import { ensureDir } from '../utils/fs.js';
import type { AppPaths } from './paths.js';

const LOCK_RETRY_MS = 10;
const LOCK_TIMEOUT_MS = 10_000;

function isAlreadyLocked(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

async function acquireIndexLock(paths: AppPaths, owner: string): Promise<void> {
  await ensureDir(path.dirname(paths.jobIndexLockFile));
  const deadline = Date.now() + LOCK_TIMEOUT_MS;

  for (;;) {
    try {
      const handle = await fs.open(paths.jobIndexLockFile, 'wx');
      try {
        await handle.writeFile(`${owner}\n`, 'utf8');
      } finally {
        await handle.close();
      }
      return;
    } catch (error) {
      if (!isAlreadyLocked(error)) {
        throw error;
      }
      if (Date.now() >= deadline) {
        throw new DocPublishError('E_STORAGE_IO', 'Timed out waiting for the job index lock', {
          lockFile: paths.jobIndexLockFile
        });
      }
      await sleep(LOCK_RETRY_MS);
    }
  }
}

/** Runs `update` while holding the job index lock file. */
export async function withJobIndexLock<T>(paths: AppPaths, owner: string, update: () => Promise<T>): Promise<T> {
  await acquireIndexLock(paths, owner);
  try {
    return await update();
  } finally {
    await fs.rm(paths.jobIndexLockFile, { force: true });
  }
}
