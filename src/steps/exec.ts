import { DocPublishError } from '../core/error-codes.js';
import type { ErrorCode } from '../core/error-codes.js';
import type { CommandResult } from '../exec/command-runner.js';
import type { StepContext } from './types.js';

const STDERR_TAIL_LINES = 20;

function subcommand(args: string[]): string | undefined {
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '-c') {
      index += 1;
      continue;
    }
    if (!arg.startsWith('-')) {
      return arg;
    }
  }
  return undefined;
}

function tail(output: string): string {
  return output.trimEnd().split('\n').slice(-STDERR_TAIL_LINES).join('\n');
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Run a command for a step, turning a spawn failure or non-zero exit into the step's error. */
export async function runOrFail(
  ctx: StepContext,
  code: ErrorCode,
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const label = [command, subcommand(args)].filter(Boolean).join(' ');
  let result: CommandResult;
  try {
    result = await ctx.runner.run(command, args, {
      cwd: options.cwd ?? ctx.workspaceDir,
      env: options.env ?? ctx.env
    });
  } catch (error) {
    throw new DocPublishError(code, `${label} could not be started: ${error instanceof Error ? error.message : String(error)}`, {
      command
    });
  }

  if (result.exitCode !== 0) {
    throw new DocPublishError(code, `${label} exited with code ${result.exitCode}`, {
      command,
      exitCode: result.exitCode,
      stderr: tail(result.stderr)
    });
  }
  return result;
}
