import { z } from 'zod';
import { LocalSlotStart } from '../../../common/validation/patterns.js';

export const DeleteSlotSchema = z.object({
  doctor_id: z.string().uuid().optional(),
  slot_start: LocalSlotStart,
});

export type DeleteSlotDto = z.infer<typeof DeleteSlotSchema>;
