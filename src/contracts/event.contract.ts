import { z } from 'zod';

export const sha1Pattern = /^[0-9a-f]{40}$/;
export const repositoryPattern = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

export const eventTypeSchema = z.enum(['push', 'pull_request']);

export const eventContextSchema = z.object({
  type: eventTypeSchema,
  ref: z.string().min(1),
  branch: z.string(),
  sha: z.string().regex(sha1Pattern, 'Commit SHA must be lowercase 40-hex').optional(),
  repository: z.string().regex(repositoryPattern, 'Repository must be owner/name').optional(),
  serverUrl: z.string().url().default('https://github.com')
});

export const jobEventSchema = z.object({
  eventId: z.string().min(1),
  jobId: z.string().min(1),
  type: z.enum(['transition', 'step']),
  name: z.string().min(1),
  timestamp: z.string().datetime(),
  payload: z.record(z.unknown())
});
