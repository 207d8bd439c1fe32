import { jobEventSchema } from '../contracts/event.contract.js';
import { validationError } from '../core/error-codes.js';
import type { JobEvent } from '../types/event.js';
import { appendNdjson, readNdjson } from '../utils/fs.js';
import type { AppPaths } from './paths.js';
import { eventsFile } from './paths.js';

export async function appendEvent(paths: AppPaths, event: JobEvent): Promise<void> {
  const parsed = jobEventSchema.safeParse(event);
  if (!parsed.success) {
    throw validationError('Event contract validation failed', parsed.error);
  }
  await appendNdjson(eventsFile(paths, event.jobId), parsed.data);
}

export async function readEvents(paths: AppPaths, jobId: string): Promise<JobEvent[]> {
  const parsed = jobEventSchema.array().safeParse(await readNdjson(eventsFile(paths, jobId)));
  if (!parsed.success) {
    throw validationError(`Stored events for ${jobId} are invalid`, parsed.error);
  }
  return parsed.data;
}
