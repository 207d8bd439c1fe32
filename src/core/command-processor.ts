import path from 'node:path';

import { parseCommand } from '../cli/parser.js';
import type { EventSource, ParsedCommand, ParsedPlanCommand, ParsedRunCommand, ParsedStatusCommand } from '../cli/types.js';
import { jobIdPattern } from '../contracts/job.contract.js';
import { SpawnCommandRunner } from '../exec/command-runner.js';
import type { CommandRunner } from '../exec/command-runner.js';
import { planJob, runWorkflow } from '../orchestration/job-runner.js';
import { readJob, readLatestJob } from '../store/job-store.js';
import { resolvePaths } from '../store/paths.js';
import type { EventContext } from '../types/event.js';
import type { Job } from '../types/job.js';
import { applyLogLevelFromEnv, loadWorkflowConfig } from './config.js';
import { DocPublishError } from './error-codes.js';
import { buildEventContext, eventContextFromEnv } from './github-env.js';
import { logger } from './logger.js';

export interface ProcessOptions {
  rootDir: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}

interface SuccessPayload {
  ok: true;
  data: unknown;
}

function resolveEvent(source: EventSource, env: NodeJS.ProcessEnv): EventContext {
  return source.kind === 'env' ? eventContextFromEnv(env) : buildEventContext(source.input);
}

function summarizeJob(job: Job): Record<string, unknown> {
  return {
    jobId: job.jobId,
    status: job.status,
    event: { type: job.event.type, ref: job.event.ref, branch: job.event.branch },
    publish: job.publish,
    steps: job.steps.map((step) => ({ name: step.name, status: step.status })),
    ...(job.deployment ? { deployment: job.deployment } : {}),
    ...(job.failure ? { failure: job.failure } : {})
  };
}

async function handlePlan(command: ParsedPlanCommand, options: ProcessOptions): Promise<SuccessPayload> {
  const paths = resolvePaths(options.rootDir);
  const config = await loadWorkflowConfig(paths.workflowConfigFile);
  const plan = planJob(resolveEvent(command.source, options.env ?? process.env), config);
  return { ok: true, data: plan };
}

async function handleRun(command: ParsedRunCommand, options: ProcessOptions): Promise<SuccessPayload> {
  const env = options.env ?? process.env;
  const paths = resolvePaths(options.rootDir);
  const config = await loadWorkflowConfig(paths.workflowConfigFile);
  const event = resolveEvent(command.source, env);

  const { plan, job } = await runWorkflow({
    paths,
    event,
    config,
    env,
    runner: options.runner ?? new SpawnCommandRunner(logger.child({ component: 'exec' })),
    workspaceDir: command.workspace ? path.resolve(options.rootDir, command.workspace) : undefined,
    dryRun: command.dryRun
  });

  return {
    ok: true,
    data: {
      triggered: plan.triggered,
      publish: plan.publish,
      dryRun: command.dryRun,
      job: job ? summarizeJob(job) : null
    }
  };
}

async function handleStatus(command: ParsedStatusCommand, options: ProcessOptions): Promise<SuccessPayload> {
  const paths = resolvePaths(options.rootDir);

  if (command.jobId !== undefined) {
    if (!jobIdPattern.test(command.jobId)) {
      throw new DocPublishError('E_CONTRACT_VALIDATION', `Invalid job id: ${command.jobId}`);
    }
    const job = await readJob(paths, command.jobId);
    if (!job) {
      throw new DocPublishError('E_JOB_NOT_FOUND', `Job not found: ${command.jobId}`, { jobId: command.jobId });
    }
    return { ok: true, data: job };
  }

  const latest = await readLatestJob(paths);
  if (!latest) {
    throw new DocPublishError('E_JOB_NOT_FOUND', 'No jobs recorded yet');
  }
  return { ok: true, data: latest };
}

export async function processParsedCommand(command: ParsedCommand, options: ProcessOptions): Promise<SuccessPayload> {
  switch (command.command) {
    case 'plan':
      return handlePlan(command, options);
    case 'run':
      return handleRun(command, options);
    case 'status':
      return handleStatus(command, options);
  }
}

export async function processCommandFromArgv(argv: string[], options: ProcessOptions): Promise<SuccessPayload> {
  applyLogLevelFromEnv(options.env ?? process.env);
  return processParsedCommand(parseCommand(argv), options);
}
