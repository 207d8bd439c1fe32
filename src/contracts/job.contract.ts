import { z } from 'zod';

import { cliErrorCodeSchema } from './cli-error.contract.js';
import { eventContextSchema } from './event.contract.js';

export const jobIdPattern = /^job_[0-9]{8}T[0-9]{6}Z_[a-z0-9]{6}$/;

export const jobStatusSchema = z.enum([
  'pending',
  'checked_out',
  'toolchain_ready',
  'built',
  'published',
  'skipped',
  'done',
  'failed'
]);

export const stepNameSchema = z.enum(['checkout', 'toolchain', 'build', 'publish']);

export const stepStatusSchema = z.enum(['pending', 'running', 'succeeded', 'failed', 'skipped']);

export const stepRecordSchema = z.object({
  name: stepNameSchema,
  status: stepStatusSchema,
  startedAt: z.string().datetime().optional(),
  finishedAt: z.string().datetime().optional(),
  exitCode: z.number().int().optional(),
  message: z.string().optional()
});

export const jobSchema = z
  .object({
    jobId: z.string().regex(jobIdPattern),
    status: jobStatusSchema,
    event: eventContextSchema,
    workspaceDir: z.string().min(1),
    publish: z.boolean(),
    steps: z.array(stepRecordSchema).length(4),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
    failure: z
      .object({
        step: stepNameSchema,
        code: cliErrorCodeSchema,
        message: z.string()
      })
      .optional(),
    deployment: z
      .object({
        targetBranch: z.string().min(1),
        commit: z.string().optional(),
        changed: z.boolean()
      })
      .optional()
  })
  .superRefine((job, ctx) => {
    const order = job.steps.map((step) => step.name).join(',');
    if (order !== 'checkout,toolchain,build,publish') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Job steps must be checkout, toolchain, build, publish in order' });
    }

    if (job.status === 'failed' && !job.failure) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Failed job must record a failure' });
    }
  });

export const jobIndexSchema = z.array(z.string().regex(jobIdPattern));
