import { z } from 'zod';
import { IsoDate } from '../../../common/validation/patterns.js';

// Slot starts are checked one by one in the service, so a malformed entry
// is reported back instead of failing the whole request.
export const CreateBlockSchema = z.object({
  patient_id: z.string().uuid().optional(),
  doctor_id: z.string().uuid(),
  date: IsoDate,
  slot_starts: z.array(z.string()).min(1).max(48),
  reason: z.string().max(1000).optional(),
  payment_id: z.string().uuid().optional(),
});

export type CreateBlockDto = z.infer<typeof CreateBlockSchema>;
