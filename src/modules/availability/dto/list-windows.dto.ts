import { z } from 'zod';
import { IsoDate } from '../../../common/validation/patterns.js';

export const ListWindowsSchema = z.object({
  doctor_id: z.string().uuid().optional(),
  from: IsoDate.optional(),
  to: IsoDate.optional(),
});

export type ListWindowsDto = z.infer<typeof ListWindowsSchema>;
