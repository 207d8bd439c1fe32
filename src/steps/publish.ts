import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { DocPublishError } from '../core/error-codes.js';
import { copyDir, emptyDir, isDirectory } from '../utils/fs.js';
import { readToken, repositoryUrl } from './credentials.js';
import { runOrFail } from './exec.js';
import type { JobStep, StepContext } from './types.js';

export function defaultCommitMessage(ctx: StepContext): string {
  return `deploy: ${ctx.event.sha ?? ctx.event.ref}`;
}

async function requireDirectory(dirPath: string): Promise<void> {
  if (!(await isDirectory(dirPath))) {
    throw new DocPublishError('E_PUBLISH_FAILED', `Publish directory does not exist: ${dirPath}`, {
      publishDir: dirPath
    });
  }
}

/** Clone the hosting branch, or start it as an orphan when it does not exist yet. */
async function prepareTree(ctx: StepContext, treeDir: string, remoteUrl: string): Promise<void> {
  const { targetBranch } = ctx.config.publish;
  const clone = await ctx.runner.run(
    'git',
    ['clone', '--depth=1', '--single-branch', '--branch', targetBranch, remoteUrl, '.'],
    { cwd: treeDir, env: ctx.env }
  );
  if (clone.exitCode === 0) {
    return;
  }

  ctx.log.info('hosting branch not found, starting a new one', { targetBranch });
  await fs.rm(treeDir, { recursive: true, force: true });
  await fs.mkdir(treeDir, { recursive: true });
  await runOrFail(ctx, 'E_PUBLISH_FAILED', 'git', ['init', '-q'], { cwd: treeDir });
  await runOrFail(ctx, 'E_PUBLISH_FAILED', 'git', ['checkout', '--orphan', targetBranch], { cwd: treeDir });
  await runOrFail(ctx, 'E_PUBLISH_FAILED', 'git', ['remote', 'add', 'origin', remoteUrl], { cwd: treeDir });
}

export const publishStep: JobStep = {
  name: 'publish',
  errorCode: 'E_PUBLISH_FAILED',
  async execute(ctx) {
    const publish = ctx.config.publish;
    const token = readToken(ctx);
    if (!token) {
      throw new DocPublishError('E_PUBLISH_FAILED', `Credential is missing: set ${publish.tokenEnv}`, {
        tokenEnv: publish.tokenEnv
      });
    }
    if (!ctx.event.repository) {
      throw new DocPublishError('E_PUBLISH_FAILED', 'Repository is required to publish');
    }

    const sourceDir = path.resolve(ctx.workspaceDir, publish.publishDir);
    await requireDirectory(sourceDir);

    const treeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'doc-publish-'));
    const run = (args: string[]) => runOrFail(ctx, 'E_PUBLISH_FAILED', 'git', args, { cwd: treeDir });
    try {
      await prepareTree(ctx, treeDir, repositoryUrl(ctx.event.serverUrl, ctx.event.repository, token));

      if (!publish.keepFiles) {
        await emptyDir(treeDir, ['.git']);
      }
      await copyDir(sourceDir, treeDir);
      if (publish.nojekyll) {
        await fs.writeFile(path.join(treeDir, '.nojekyll'), '', 'utf8');
      }
      if (publish.cname) {
        await fs.writeFile(path.join(treeDir, 'CNAME'), `${publish.cname}\n`, 'utf8');
      }

      await run(['config', 'user.name', publish.userName]);
      await run(['config', 'user.email', publish.userEmail]);
      await run(['add', '--all']);

      const status = await run(['status', '--porcelain']);
      if (status.stdout.trim() === '') {
        ctx.log.info('published tree unchanged, nothing to push', { targetBranch: publish.targetBranch });
        return {
          message: 'No changes to publish',
          deployment: { targetBranch: publish.targetBranch, changed: false }
        };
      }

      await run(['commit', '-q', '-m', publish.commitMessage ?? defaultCommitMessage(ctx)]);
      const head = await run(['rev-parse', 'HEAD']);
      await run(['push', 'origin', publish.targetBranch]);

      const commit = head.stdout.trim();
      return {
        message: `Published ${publish.publishDir} to ${publish.targetBranch}`,
        deployment: { targetBranch: publish.targetBranch, commit, changed: true }
      };
    } finally {
      await fs.rm(treeDir, { recursive: true, force: true });
    }
  }
};
