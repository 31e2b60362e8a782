import { z } from 'zod';

export const ListBlocksSchema = z.object({
  view: z.enum(['patient', 'doctor']).optional(),
  doctor_id: z.string().uuid().optional(),
  patient_id: z.string().uuid().optional(),
});

export type ListBlocksDto = z.infer<typeof ListBlocksSchema>;
