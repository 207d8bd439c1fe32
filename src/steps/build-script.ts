import path from 'node:path';

import { runOrFail } from './exec.js';
import type { JobStep } from './types.js';

export function resolveScript(workspaceDir: string, script: string): string {
  return script.includes('/') ? path.resolve(workspaceDir, script) : script;
}

export const buildStep: JobStep = {
  name: 'build',
  errorCode: 'E_BUILD_SCRIPT_FAILED',
  async execute(ctx) {
    const { script, args } = ctx.config.build;
    const result = await runOrFail(ctx, 'E_BUILD_SCRIPT_FAILED', resolveScript(ctx.workspaceDir, script), args, {
      env: { ...ctx.env, ...ctx.config.env }
    });
    return { exitCode: result.exitCode, message: `${script} finished` };
  }
};
