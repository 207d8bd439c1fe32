import type { JobStatus, StepStatus } from '../types/job.js';

const transitionMap: Record<JobStatus, JobStatus[]> = {
  pending: ['checked_out', 'failed'],
  checked_out: ['toolchain_ready', 'failed'],
  toolchain_ready: ['built', 'failed'],
  built: ['published', 'skipped', 'failed'],
  published: ['done', 'failed'],
  skipped: ['done', 'failed'],
  done: [],
  failed: []
};

const stepTransitionMap: Record<StepStatus, StepStatus[]> = {
  pending: ['running', 'skipped'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
  skipped: []
};

export function canTransitionJob(from: JobStatus, to: JobStatus): boolean {
  return transitionMap[from].includes(to);
}

export function canTransitionStep(from: StepStatus, to: StepStatus): boolean {
  return stepTransitionMap[from].includes(to);
}

export function requireJobTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransitionJob(from, to)) {
    throw new Error(`Invalid job transition from ${from} to ${to}`);
  }
}

export function requireStepTransition(from: StepStatus, to: StepStatus): void {
  if (!canTransitionStep(from, to)) {
    throw new Error(`Invalid job transition for step from ${from} to ${to}`);
  }
}
