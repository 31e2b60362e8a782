import { z } from 'zod';
import { IsoDate, TimeOfDay } from '../../../common/validation/patterns.js';

export const UpsertWindowSchema = z.object({
  doctor_id: z.string().uuid().optional(),
  date: IsoDate,
  start_time: TimeOfDay,
  end_time: TimeOfDay,
});

export type UpsertWindowDto = z.infer<typeof UpsertWindowSchema>;
