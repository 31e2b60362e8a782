import { z } from 'zod';
import { LocalSlotStart } from '../../../common/validation/patterns.js';

export const RequestRescheduleSchema = z.object({
  patient_id: z.string().uuid().optional(),
  doctor_id: z.string().uuid(),
  block_start: LocalSlotStart,
  block_end: LocalSlotStart,
  new_slot_start: LocalSlotStart,
});

export type RequestRescheduleDto = z.infer<typeof RequestRescheduleSchema>;
