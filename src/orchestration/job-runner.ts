import { DocPublishError } from '../core/error-codes.js';
import { logger as rootLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { maskSecrets } from '../core/secrets.js';
import { requireJobTransition, requireStepTransition } from '../domain/job-lifecycle.js';
import { shouldPublish, shouldTrigger } from '../domain/trigger.js';
import type { CommandRunner } from '../exec/command-runner.js';
import { defaultSteps } from '../steps/index.js';
import type { JobStep, StepContext, StepOutcome } from '../steps/index.js';
import { appendEvent } from '../store/event-log.js';
import { initStorage } from '../store/init-storage.js';
import { appendJobIndex, writeJob } from '../store/job-store.js';
import { jobWorkspaceDir } from '../store/paths.js';
import type { AppPaths } from '../store/paths.js';
import type { EventContext } from '../types/event.js';
import type { Job, JobStatus, StepName, StepRecord } from '../types/job.js';
import type { WorkflowConfig } from '../types/workflow.js';
import { createEventId, createJobId } from '../utils/ids.js';
import { nowIso } from '../utils/time.js';

export interface JobPlan {
  triggered: boolean;
  publish: boolean;
  event: EventContext;
  steps: Array<{ name: StepName; runs: boolean }>;
}

export interface RunWorkflowOptions {
  paths: AppPaths;
  event: EventContext;
  config: WorkflowConfig;
  runner: CommandRunner;
  workspaceDir?: string;
  env?: NodeJS.ProcessEnv;
  dryRun?: boolean;
  log?: Logger;
}

export interface RunWorkflowResult {
  plan: JobPlan;
  job: Job | null;
}

const statusAfterStep: Record<StepName, JobStatus> = {
  checkout: 'checked_out',
  toolchain: 'toolchain_ready',
  build: 'built',
  publish: 'published'
};

export function planJob(event: EventContext, config: WorkflowConfig): JobPlan {
  const triggered = shouldTrigger(event, config.on);
  const publish = triggered && shouldPublish(event.type, event.branch, config.publish.branch);
  return {
    triggered,
    publish,
    event,
    steps: defaultSteps.map((step) => ({
      name: step.name,
      runs: step.name === 'publish' ? publish : triggered
    }))
  };
}

export function createJob(event: EventContext, publish: boolean, workspaceDir: string, jobId = createJobId()): Job {
  const now = nowIso();
  return {
    jobId,
    status: 'pending',
    event,
    workspaceDir,
    publish,
    steps: defaultSteps.map((step) => ({ name: step.name, status: 'pending' })),
    createdAt: now,
    updatedAt: now
  };
}

export function transitionJob(job: Job, nextStatus: JobStatus): Job {
  requireJobTransition(job.status, nextStatus);
  return { ...job, status: nextStatus, updatedAt: nowIso() };
}

export function updateStep(job: Job, name: StepName, patch: Partial<StepRecord> & Pick<StepRecord, 'status'>): Job {
  return {
    ...job,
    updatedAt: nowIso(),
    steps: job.steps.map((step) => {
      if (step.name !== name) {
        return step;
      }
      requireStepTransition(step.status, patch.status);
      return { ...step, ...patch };
    })
  };
}

function toStepError(step: JobStep, error: unknown): DocPublishError {
  if (error instanceof DocPublishError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DocPublishError(step.errorCode, `${step.name} failed: ${message}`);
}

/**
 * Runs checkout, toolchain, build and publish strictly in order. The first
 * failing step fails the job; the record is saved and the error rethrown.
 */
async function executeJob(options: RunWorkflowOptions, plan: JobPlan): Promise<Job> {
  const { paths, event, config, runner } = options;
  const jobId = createJobId();
  const workspaceDir = options.workspaceDir ?? jobWorkspaceDir(paths, jobId);
  let job = createJob(event, plan.publish, workspaceDir, jobId);
  const log = (options.log ?? rootLogger).child({ workflow: config.name, jobId: job.jobId });
  let sequence = 0;

  const persist = async (type: 'transition' | 'step', name: string, payload: Record<string, unknown>): Promise<void> => {
    await writeJob(paths, job);
    sequence += 1;
    await appendEvent(paths, {
      eventId: createEventId(job.jobId, sequence),
      jobId: job.jobId,
      type,
      name,
      timestamp: nowIso(),
      payload
    });
  };

  await initStorage(paths);
  await appendJobIndex(paths, job.jobId);
  await persist('transition', 'pending', { type: event.type, ref: event.ref, branch: event.branch, publish: job.publish });
  log.info('job started', { event: event.type, branch: event.branch, publish: job.publish });

  const ctx: StepContext = {
    jobId: job.jobId,
    event,
    workspaceDir,
    config,
    env: options.env ?? process.env,
    runner,
    log
  };

  for (const step of defaultSteps) {
    if (step.name === 'publish' && !job.publish) {
      job = updateStep(job, 'publish', { status: 'skipped', message: 'Publish condition not met' });
      job = transitionJob(job, 'skipped');
      await persist('step', 'publish', { status: 'skipped' });
      log.info('publish skipped', { eventType: event.type, branch: event.branch, publishBranch: config.publish.branch });
      continue;
    }

    job = updateStep(job, step.name, { status: 'running', startedAt: nowIso() });
    await persist('step', step.name, { status: 'running' });
    log.info('step started', { step: step.name });

    let outcome: StepOutcome;
    try {
      outcome = await step.execute({ ...ctx, log: log.child({ step: step.name }) });
    } catch (error) {
      const failure = toStepError(step, error);
      const message = maskSecrets(failure.message);
      const exitCode = failure.details?.exitCode;
      job = updateStep(job, step.name, {
        status: 'failed',
        finishedAt: nowIso(),
        message,
        ...(typeof exitCode === 'number' ? { exitCode } : {})
      });
      job = {
        ...transitionJob(job, 'failed'),
        failure: { step: step.name, code: failure.code, message }
      };
      await persist('step', step.name, { status: 'failed', code: failure.code });
      log.error('step failed', { step: step.name, code: failure.code, message });
      throw new DocPublishError(failure.code, failure.message, {
        ...failure.details,
        jobId: job.jobId,
        step: step.name
      });
    }

    job = updateStep(job, step.name, {
      status: 'succeeded',
      finishedAt: nowIso(),
      ...(outcome.exitCode !== undefined ? { exitCode: outcome.exitCode } : {}),
      ...(outcome.message ? { message: outcome.message } : {})
    });
    if (outcome.deployment) {
      job = { ...job, deployment: outcome.deployment };
    }
    job = transitionJob(job, statusAfterStep[step.name]);
    await persist('step', step.name, { status: 'succeeded' });
    log.info('step succeeded', { step: step.name });
  }

  job = transitionJob(job, 'done');
  await persist('transition', 'done', { published: job.steps.some((step) => step.name === 'publish' && step.status === 'succeeded') });
  log.info('job finished', { status: job.status });
  return job;
}

export async function runWorkflow(options: RunWorkflowOptions): Promise<RunWorkflowResult> {
  const plan = planJob(options.event, options.config);
  const log = options.log ?? rootLogger;

  if (!plan.triggered) {
    log.info('event does not match workflow triggers', { event: options.event.type, branch: options.event.branch });
    return { plan, job: null };
  }
  if (options.dryRun) {
    log.info('dry run, no job created', { publish: plan.publish });
    return { plan, job: null };
  }

  return { plan, job: await executeJob(options, plan) };
}
