import { z } from 'zod';

export const OpenPaymentSchema = z.object({
  patient_id: z.string().uuid().optional(),
  amount_cents: z.number().int().positive(),
  currency: z.string().min(3).max(10).default('usd'),
  description: z.string().max(255).optional(),
  provider_reference: z.string().min(1).max(255),
});

export type OpenPaymentDto = z.infer<typeof OpenPaymentSchema>;
