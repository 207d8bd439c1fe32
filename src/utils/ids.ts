import crypto from 'node:crypto';

import { toJobTimestamp } from './time.js';

export function createJobId(now = new Date()): string {
  const suffix = crypto.randomBytes(3).toString('hex');
  return `job_${toJobTimestamp(now)}_${suffix}`;
}

/** Event ids sort in write order within their job. */
export function createEventId(jobId: string, sequence: number): string {
  return `${jobId}.${String(sequence).padStart(4, '0')}`;
}
