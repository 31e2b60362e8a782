import { z } from 'zod';
import { SETTABLE_STATUSES } from '../appointment.service.js';

export const SetStatusSchema = z.object({
  slot_ids: z.array(z.string().uuid()).min(1),
  status: z.enum(SETTABLE_STATUSES),
});

export type SetStatusDto = z.infer<typeof SetStatusSchema>;
