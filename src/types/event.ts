import type { z } from 'zod';

import type { eventContextSchema, eventTypeSchema, jobEventSchema } from '../contracts/event.contract.js';

export type EventType = z.infer<typeof eventTypeSchema>;
export type EventContext = z.infer<typeof eventContextSchema>;
export type JobEvent = z.infer<typeof jobEventSchema>;
