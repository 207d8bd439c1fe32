import { jobIndexSchema, jobSchema } from '../contracts/job.contract.js';
import { validationError } from '../core/error-codes.js';
import type { Job } from '../types/job.js';
import { exists, readJsonFile, readJsonFileOrDefault, writeJsonAtomic } from '../utils/fs.js';
import { withJobIndexLock } from './lock-service.js';
import type { AppPaths } from './paths.js';
import { jobFile } from './paths.js';

export async function readJobIndex(paths: AppPaths): Promise<string[]> {
  const parsed = jobIndexSchema.safeParse(await readJsonFileOrDefault(paths.jobIndexFile, []));
  if (!parsed.success) {
    throw validationError('Job index is invalid', parsed.error);
  }
  return parsed.data;
}

export async function appendJobIndex(paths: AppPaths, jobId: string): Promise<void> {
  await withJobIndexLock(paths, jobId, async () => {
    const jobIds = await readJobIndex(paths);
    if (!jobIds.includes(jobId)) {
      jobIds.push(jobId);
    }
    await writeJsonAtomic(paths.jobIndexFile, jobIds);
  });
}

export async function readJob(paths: AppPaths, jobId: string): Promise<Job | null> {
  const filePath = jobFile(paths, jobId);
  if (!(await exists(filePath))) {
    return null;
  }
  const parsed = jobSchema.safeParse(await readJsonFile(filePath));
  if (!parsed.success) {
    throw validationError(`Stored job ${jobId} is invalid`, parsed.error);
  }
  return parsed.data;
}

export async function readLatestJob(paths: AppPaths): Promise<Job | null> {
  const jobIds = await readJobIndex(paths);
  const latest = jobIds.at(-1);
  return latest ? readJob(paths, latest) : null;
}

export async function writeJob(paths: AppPaths, job: Job): Promise<void> {
  const parsed = jobSchema.safeParse(job);
  if (!parsed.success) {
    throw validationError('Job contract validation failed', parsed.error);
  }
  await writeJsonAtomic(jobFile(paths, job.jobId), parsed.data);
}
