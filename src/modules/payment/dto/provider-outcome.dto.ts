import { z } from 'zod';
import { PAYMENT_STATUSES } from '../../../database/schema/index.js';

export const ProviderOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    reference: z.string().min(1),
    ok: z.literal(true),
    status: z.enum(PAYMENT_STATUSES),
  }),
  z.object({
    reference: z.string().min(1),
    ok: z.literal(false),
    error: z.string().min(1),
  }),
]);

export type ProviderOutcomeDto = z.infer<typeof ProviderOutcomeSchema>;
