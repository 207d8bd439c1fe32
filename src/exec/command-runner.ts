import { spawn } from 'node:child_process';

import type { Logger } from '../core/logger.js';

export interface CommandOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program to completion. A non-zero exit is reported in the
 * result, not thrown; only a failure to spawn rejects.
 */
export interface CommandRunner {
  run(command: string, args: string[], options: CommandOptions): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly log: Logger) {}

  run(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
    this.log.debug('exec', { command, args, cwd: options.cwd });

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe']
      });
      let stdout = '';
      let stderr = '';
      let pendingLine = '';
      const forwardLine = (line: string): void => {
        if (line.trim()) {
          this.log.debug(line, { command, stream: 'stderr' });
        }
      };

      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');
      proc.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on('data', (chunk: string) => {
        stderr += chunk;
        // build tools print progress on stderr; forward whole lines as they arrive
        const lines = (pendingLine + chunk).split('\n');
        pendingLine = lines.pop() ?? '';
        lines.forEach(forwardLine);
      });
      proc.on('error', reject);
      proc.on('close', (code, signal) => {
        forwardLine(pendingLine);
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout,
          stderr
        });
      });
    });
  }
}
