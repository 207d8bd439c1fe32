import type { z } from 'zod';

import type {
  jobSchema,
  jobStatusSchema,
  stepNameSchema,
  stepRecordSchema,
  stepStatusSchema
} from '../contracts/job.contract.js';

export type JobStatus = z.infer<typeof jobStatusSchema>;
export type StepName = z.infer<typeof stepNameSchema>;
export type StepStatus = z.infer<typeof stepStatusSchema>;
export type StepRecord = z.infer<typeof stepRecordSchema>;
export type Job = z.infer<typeof jobSchema>;
