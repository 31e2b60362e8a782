import { z } from 'zod';
import { IsoDate } from '../../../common/validation/patterns.js';

export const ListSlotsSchema = z.object({
  doctor_id: z.string().uuid(),
  date: IsoDate,
});

export type ListSlotsDto = z.infer<typeof ListSlotsSchema>;
