import type { z } from 'zod';

import type { cliErrorCodeSchema, cliErrorSchema } from '../contracts/cli-error.contract.js';

export type CliErrorCode = z.infer<typeof cliErrorCodeSchema>;
export type CliErrorPayload = z.infer<typeof cliErrorSchema>;
