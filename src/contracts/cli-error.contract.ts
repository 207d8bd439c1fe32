import { z } from 'zod';

export const cliErrorCodeSchema = z.enum([
  'E_USAGE',
  'E_CONTRACT_VALIDATION',
  'E_INVALID_TRANSITION',
  'E_CHECKOUT_FAILED',
  'E_TOOLCHAIN_INSTALL_FAILED',
  'E_BUILD_SCRIPT_FAILED',
  'E_PUBLISH_FAILED',
  'E_JOB_NOT_FOUND',
  'E_STORAGE_IO',
  'E_INTERNAL'
]);

export const cliErrorSchema = z.object({
  ok: z.literal(false),
  error: z.object({
    code: cliErrorCodeSchema,
    message: z.string(),
    details: z.record(z.unknown()).optional()
  })
});
