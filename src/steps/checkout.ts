import path from 'node:path';

import { DocPublishError } from '../core/error-codes.js';
import { ensureDir, exists } from '../utils/fs.js';
import { basicAuthHeader, readToken, repositoryUrl } from './credentials.js';
import { runOrFail } from './exec.js';
import type { JobStep } from './types.js';

export const checkoutStep: JobStep = {
  name: 'checkout',
  errorCode: 'E_CHECKOUT_FAILED',
  async execute(ctx) {
    const { event, workspaceDir, config } = ctx;
    await ensureDir(workspaceDir);

    if (!(await exists(path.join(workspaceDir, '.git')))) {
      if (!event.repository) {
        throw new DocPublishError('E_CHECKOUT_FAILED', 'Repository is required to check out into an empty workspace', {
          workspaceDir
        });
      }
      await runOrFail(ctx, 'E_CHECKOUT_FAILED', 'git', ['init', '-q']);
      await runOrFail(ctx, 'E_CHECKOUT_FAILED', 'git', ['remote', 'add', 'origin', repositoryUrl(event.serverUrl, event.repository)]);
    }

    const token = readToken(ctx);
    const authArgs = token ? ['-c', `http.${event.serverUrl}/.extraheader=${basicAuthHeader(token)}`] : [];
    const target = event.sha ?? event.ref;

    await runOrFail(ctx, 'E_CHECKOUT_FAILED', 'git', [
      ...authArgs,
      'fetch',
      '--no-tags',
      '--prune',
      `--depth=${config.checkout.fetchDepth}`,
      'origin',
      target
    ]);
    await runOrFail(ctx, 'E_CHECKOUT_FAILED', 'git', ['checkout', '--force', '--detach', 'FETCH_HEAD']);
    if (config.checkout.clean) {
      await runOrFail(ctx, 'E_CHECKOUT_FAILED', 'git', ['clean', '-ffdx']);
    }

    return { message: `Checked out ${target}` };
  }
};
