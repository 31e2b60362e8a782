import { z } from 'zod';
import { RESCHEDULE_DECISIONS } from '../services/reschedule.service.js';

export const DecideRescheduleSchema = z.object({
  decision: z.enum(RESCHEDULE_DECISIONS),
});

export type DecideRescheduleDto = z.infer<typeof DecideRescheduleSchema>;
