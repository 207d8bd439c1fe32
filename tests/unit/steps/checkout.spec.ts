import { promises as fs } from 'node:fs';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { checkoutStep } from '../../../src/steps/checkout.js';
import {
  FakeCommandRunner,
  TEST_SHA,
  TEST_TOKEN,
  createTestWorkspace,
  isCall,
  makeStepContext
} from '../../helpers/test-env.js';

const basicAuth = Buffer.from(`x-access-token:${TEST_TOKEN}`, 'utf8').toString('base64');

describe('checkout step', () => {
  it('initialises an empty workspace and fetches the triggering commit', async () => {
    const ws = await createTestWorkspace();
    try {
      const runner = new FakeCommandRunner();
      const outcome = await checkoutStep.execute(makeStepContext(ws.workspaceDir, runner));

      expect(runner.calls.map((call) => [call.command, ...call.args])).toEqual([
        ['git', 'init', '-q'],
        ['git', 'remote', 'add', 'origin', 'https://github.com/example-org/example-lib.git'],
        [
          'git',
          '-c',
          `http.https://github.com/.extraheader=AUTHORIZATION: basic ${basicAuth}`,
          'fetch',
          '--no-tags',
          '--prune',
          '--depth=1',
          'origin',
          TEST_SHA
        ],
        ['git', 'checkout', '--force', '--detach', 'FETCH_HEAD'],
        ['git', 'clean', '-ffdx']
      ]);
      expect(runner.calls.every((call) => call.cwd === ws.workspaceDir)).toBe(true);
      expect(outcome.message).toBe(`Checked out ${TEST_SHA}`);
    } finally {
      await ws.cleanup();
    }
  });

  it('reuses an existing clone and fetches the ref without credentials', async () => {
    const ws = await createTestWorkspace();
    try {
      await fs.mkdir(path.join(ws.workspaceDir, '.git'));
      const runner = new FakeCommandRunner();
      await checkoutStep.execute(
        makeStepContext(ws.workspaceDir, runner, {
          env: {},
          event: { sha: undefined },
          config: { checkout: { fetchDepth: 5, clean: false } }
        })
      );

      expect(runner.calls.map((call) => call.args)).toEqual([
        ['fetch', '--no-tags', '--prune', '--depth=5', 'origin', 'refs/heads/dev'],
        ['checkout', '--force', '--detach', 'FETCH_HEAD']
      ]);
    } finally {
      await ws.cleanup();
    }
  });

  it('needs a repository to populate an empty workspace', async () => {
    const ws = await createTestWorkspace();
    try {
      const runner = new FakeCommandRunner();
      await expect(
        checkoutStep.execute(makeStepContext(ws.workspaceDir, runner, { event: { repository: undefined } }))
      ).rejects.toMatchObject({ code: 'E_CHECKOUT_FAILED' });
      expect(runner.calls).toHaveLength(0);
    } finally {
      await ws.cleanup();
    }
  });

  it('fails without retrying when the fetch fails', async () => {
    const ws = await createTestWorkspace();
    try {
      const runner = new FakeCommandRunner().when(isCall('git', 'fetch'), () => ({
        exitCode: 128,
        stderr: 'fatal: could not read from remote repository\n'
      }));

      await expect(checkoutStep.execute(makeStepContext(ws.workspaceDir, runner))).rejects.toMatchObject({
        code: 'E_CHECKOUT_FAILED',
        message: 'git fetch exited with code 128',
        details: { exitCode: 128, stderr: 'fatal: could not read from remote repository' }
      });
      expect(runner.callsTo('git', 'fetch')).toHaveLength(1);
      expect(runner.callsTo('git', 'checkout')).toHaveLength(0);
    } finally {
      await ws.cleanup();
    }
  });
});
