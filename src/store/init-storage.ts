import { ensureDir } from '../utils/fs.js';
import type { AppPaths } from './paths.js';

/** The job index itself is created on first append; a missing index reads as empty. */
export async function initStorage(paths: AppPaths): Promise<void> {
  await ensureDir(paths.dataDir);
  await ensureDir(paths.jobsDir);
}
