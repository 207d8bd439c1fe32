import type { ErrorCode } from '../core/error-codes.js';
import type { Logger } from '../core/logger.js';
import type { CommandRunner } from '../exec/command-runner.js';
import type { EventContext } from '../types/event.js';
import type { Job, StepName } from '../types/job.js';
import type { WorkflowConfig } from '../types/workflow.js';

export interface StepContext {
  jobId: string;
  event: EventContext;
  workspaceDir: string;
  config: WorkflowConfig;
  env: NodeJS.ProcessEnv;
  runner: CommandRunner;
  log: Logger;
}

export interface StepOutcome {
  exitCode?: number;
  message?: string;
  deployment?: NonNullable<Job['deployment']>;
}

export interface JobStep {
  name: StepName;
  /** Code every failure of this step surfaces as. */
  errorCode: ErrorCode;
  execute(ctx: StepContext): Promise<StepOutcome>;
}
