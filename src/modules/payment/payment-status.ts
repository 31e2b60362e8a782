import type { PaymentStatus } from '../../database/schema/index.js';

/** What the payment provider reported for a reference. */
export type ProviderOutcome =
  | { ok: true; status: PaymentStatus }
  | { ok: false; error: string };

export function isPaid(payment: { status: PaymentStatus } | null | undefined): boolean {
  return payment?.status === 'paid';
}
