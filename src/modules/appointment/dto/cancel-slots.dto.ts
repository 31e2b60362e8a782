import { z } from 'zod';

export const CancelSlotsSchema = z.object({
  slot_ids: z.array(z.string().uuid()).min(1),
});

export type CancelSlotsDto = z.infer<typeof CancelSlotsSchema>;
