import { buildStep } from './build-script.js';
import { checkoutStep } from './checkout.js';
import { publishStep } from './publish.js';
import { toolchainStep } from './toolchain.js';
import type { JobStep } from './types.js';

/** Fixed execution order; publish is always last. */
export const defaultSteps: readonly JobStep[] = [checkoutStep, toolchainStep, buildStep, publishStep];

export { buildStep, checkoutStep, publishStep, toolchainStep };
export type { JobStep, StepContext, StepOutcome } from './types.js';
