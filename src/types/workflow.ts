import type { z } from 'zod';

import type {
  buildConfigSchema,
  checkoutConfigSchema,
  publishConfigSchema,
  toolchainConfigSchema,
  triggerSchema,
  workflowConfigSchema
} from '../contracts/workflow.contract.js';

export type TriggerConfig = z.infer<typeof triggerSchema>;
export type CheckoutConfig = z.infer<typeof checkoutConfigSchema>;
export type ToolchainConfig = z.infer<typeof toolchainConfigSchema>;
export type BuildConfig = z.infer<typeof buildConfigSchema>;
export type PublishConfig = z.infer<typeof publishConfigSchema>;
export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;
