import { runOrFail } from './exec.js';
import type { JobStep } from './types.js';

export const toolchainStep: JobStep = {
  name: 'toolchain',
  errorCode: 'E_TOOLCHAIN_INSTALL_FAILED',
  async execute(ctx) {
    const { channel, profile, targets, components } = ctx.config.toolchain;

    await runOrFail(ctx, 'E_TOOLCHAIN_INSTALL_FAILED', 'rustup', [
      'toolchain',
      'install',
      channel,
      '--profile',
      profile,
      '--no-self-update',
      ...targets.flatMap((target) => ['--target', target]),
      ...components.flatMap((component) => ['--component', component])
    ]);
    await runOrFail(ctx, 'E_TOOLCHAIN_INSTALL_FAILED', 'rustup', ['default', channel]);

    return { message: `Toolchain ${channel} ready` };
  }
};
