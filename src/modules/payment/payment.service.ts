import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, and } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import {
  payments,
  type PaymentRow,
  type PaymentStatus,
} from '../../database/schema/index.js';
import {
  ConflictError,
  ExternalServiceError,
  NotFoundError,
} from '../../common/errors/scheduling.errors.js';
import { isUniqueViolation } from '../../database/postgres-errors.js';
import { actingPatientId } from '../auth/access-policy.js';
import type { Principal } from '../auth/principal.js';
import type { ProviderOutcome } from './payment-status.js';

export interface OpenPaymentParams {
  patientId?: string;
  amountCents: number;
  currency: string;
  description?: string;
  providerReference: string;
}

/** Statuses no later provider outcome can change. */
const SETTLED: ReadonlySet<PaymentStatus> = new Set(['paid', 'failed']);

@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  /** Records a checkout the patient has started with the provider. */
  async openPayment(
    principal: Principal,
    params: OpenPaymentParams,
  ): Promise<PaymentRow> {
    const userId = actingPatientId(principal, params.patientId);

    try {
      const [payment] = await this.db
        .insert(payments)
        .values({
          userId,
          amountCents: params.amountCents,
          currency: params.currency,
          description: params.description ?? null,
          providerReference: params.providerReference,
          status: 'pending',
        })
        .returning();

      this.logger.log(`Opened payment ${payment.id} for patient ${userId}`);
      return payment;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Payment reference already recorded', {
          reference: params.providerReference,
        });
      }
      throw error;
    }
  }

  /** A payment that belongs to `patientId`, for attaching to a booking. */
  async getOwned(paymentId: string, patientId: string): Promise<PaymentRow> {
    const [payment] = await this.db
      .select()
      .from(payments)
      .where(and(eq(payments.id, paymentId), eq(payments.userId, patientId)));

    if (!payment) {
      throw new NotFoundError('Payment not found', { paymentId });
    }
    return payment;
  }

  /**
   * Applies the provider's answer for `reference`. Paid and failed are final
   * and later outcomes are ignored. A provider error marks the payment failed.
   */
  async recordProviderOutcome(
    reference: string,
    outcome: ProviderOutcome,
  ): Promise<PaymentRow> {
    const [payment] = await this.db
      .select()
      .from(payments)
      .where(eq(payments.providerReference, reference));

    if (!payment) {
      throw new NotFoundError('Payment not found', { reference });
    }
    if (SETTLED.has(payment.status)) {
      this.logger.log(
        `Ignoring provider outcome for ${payment.status} payment ${payment.id}`,
      );
      return payment;
    }

    if (!outcome.ok) {
      const failure = new ExternalServiceError('Payment provider reported a failure', {
        reference,
        reason: outcome.error,
      });
      this.logger.warn(
        `Payment ${payment.id} failed: ${JSON.stringify(failure.getResponse())}`,
      );
      return this.setStatus(payment.id, 'failed');
    }

    return this.setStatus(payment.id, outcome.status);
  }

  private async setStatus(
    paymentId: string,
    status: PaymentStatus,
  ): Promise<PaymentRow> {
    const [updated] = await this.db
      .update(payments)
      .set({ status, updatedAt: new Date() })
      .where(eq(payments.id, paymentId))
      .returning();

    this.logger.log(`Payment ${paymentId} is now ${status}`);
    return updated;
  }
}
