import type { EventInput } from '../core/github-env.js';

export type CommandName = 'plan' | 'run' | 'status';

export type EventSource = { kind: 'env' } | { kind: 'flags'; input: EventInput };

export interface ParsedPlanCommand {
  command: 'plan';
  source: EventSource;
}

export interface ParsedRunCommand {
  command: 'run';
  source: EventSource;
  workspace?: string;
  dryRun: boolean;
}

export interface ParsedStatusCommand {
  command: 'status';
  jobId?: string;
}

export type ParsedCommand = ParsedPlanCommand | ParsedRunCommand | ParsedStatusCommand;
