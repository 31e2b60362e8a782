import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, and, asc, inArray } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import {
  appointments,
  payments,
  type AppointmentRow,
  type AppointmentStatus,
} from '../../database/schema/index.js';
import {
  NotFoundError,
  ValidationError,
} from '../../common/errors/scheduling.errors.js';
import {
  parseIsoDate,
  parseLocalDateTime,
  localPosition,
} from '../../common/time/zoned-time.js';
import { isUniqueViolation } from '../../database/postgres-errors.js';
import {
  actingDoctorId,
  actingPatientId,
  assertCanDecide,
  canAccessBooking,
} from '../auth/access-policy.js';
import type { Principal } from '../auth/principal.js';
import { AvailabilityService } from '../availability/availability.service.js';
import { containsSlotStart } from '../availability/slot-generator.js';
import { PaymentService } from '../payment/payment.service.js';
import { groupIntoBlocks, type AppointmentBlock } from './block-grouper.js';
import {
  RescheduleService,
  type RescheduleDecision,
} from './services/reschedule.service.js';

export type BookingRejection = 'invalid' | 'unavailable' | 'taken';

export interface CreateBlockParams {
  patientId?: string;
  doctorId: string;
  date: string;
  slotStarts: string[];
  reason?: string;
  paymentId?: string;
}

export interface CreateBlockResult {
  requested: number;
  created: number;
  appointments: AppointmentRow[];
  rejected: { slotStart: string; reason: BookingRejection }[];
}

export type BlockView = 'patient' | 'doctor';

export interface ListBlocksParams {
  view?: BlockView;
  doctorId?: string;
  patientId?: string;
}

export const SETTABLE_STATUSES = [
  'requested',
  'approved',
  'rejected',
  'completed',
  'cancelled',
  'reschedule_requested',
] as const satisfies readonly AppointmentStatus[];

export type SettableStatus = (typeof SETTABLE_STATUSES)[number];

export interface BulkStatusResult {
  updated: number;
  removed: string[];
  rejected: { id: string; reason: 'not_found' | 'taken' }[];
}

export interface CancelSlotsResult {
  cancelled: number;
  removed: string[];
}

type ViewScope =
  | { view: 'patient'; patientId: string }
  | { view: 'doctor'; doctorId: string };

const DECISION_FOR_STATUS: Partial<Record<SettableStatus, RescheduleDecision>> = {
  approved: 'approve',
  rejected: 'reject',
  cancelled: 'cancel',
};

@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
    private readonly availabilityService: AvailabilityService,
    private readonly paymentService: PaymentService,
    private readonly rescheduleService: RescheduleService,
  ) {}

  /**
   * Books each requested start on its own. A start is kept only when it is
   * one of the doctor's bookable slots on `date`; the partial unique index
   * settles races between concurrent bookings.
   */
  async createBlock(
    principal: Principal,
    params: CreateBlockParams,
    timezone: string,
  ): Promise<CreateBlockResult> {
    const patientId = actingPatientId(principal, params.patientId);
    const date = parseIsoDate(params.date);
    if (params.paymentId) {
      await this.paymentService.getOwned(params.paymentId, patientId);
    }

    const bookable = await this.availabilityService.listSlots(
      params.doctorId,
      date,
      timezone,
    );

    const requested = [...new Set(params.slotStarts)];
    const created: AppointmentRow[] = [];
    const rejected: CreateBlockResult['rejected'] = [];

    for (const slotStart of requested) {
      const start = this.parseRequestedStart(slotStart, date, timezone);
      if (!start) {
        rejected.push({ slotStart, reason: 'invalid' });
        continue;
      }
      if (!containsSlotStart(bookable, start)) {
        rejected.push({ slotStart, reason: 'unavailable' });
        continue;
      }

      try {
        const [appointment] = await this.db
          .insert(appointments)
          .values({
            patientId,
            doctorId: params.doctorId,
            scheduledFor: start,
            reason: params.reason ?? null,
            status: 'requested',
            paymentId: params.paymentId ?? null,
          })
          .returning();
        created.push(appointment);
      } catch (error) {
        if (!isUniqueViolation(error)) throw error;
        this.logger.warn(`Slot ${slotStart} of doctor ${params.doctorId} was taken`);
        rejected.push({ slotStart, reason: 'taken' });
      }
    }

    this.logger.log(
      `Booked ${created.length} of ${requested.length} slots with doctor ${params.doctorId} for patient ${patientId}`,
    );
    return {
      requested: requested.length,
      created: created.length,
      appointments: created,
      rejected,
    };
  }

  async listBlocks(
    principal: Principal,
    params: ListBlocksParams,
    timezone: string,
  ): Promise<AppointmentBlock[]> {
    const scope = this.resolveView(principal, params);

    const rows = await this.db
      .select({
        id: appointments.id,
        doctorId: appointments.doctorId,
        patientId: appointments.patientId,
        scheduledFor: appointments.scheduledFor,
        status: appointments.status,
        reason: appointments.reason,
        paymentId: appointments.paymentId,
        paymentStatus: payments.status,
        rescheduledFromId: appointments.rescheduledFromId,
      })
      .from(appointments)
      .leftJoin(payments, eq(appointments.paymentId, payments.id))
      .where(
        scope.view === 'patient'
          ? eq(appointments.patientId, scope.patientId)
          : eq(appointments.doctorId, scope.doctorId),
      )
      .orderBy(
        scope.view === 'patient'
          ? asc(appointments.doctorId)
          : asc(appointments.patientId),
        asc(appointments.scheduledFor),
      );

    return groupIntoBlocks(rows, { timezone });
  }

  /**
   * Sets one status on many records. Records linked to an original are
   * decided rather than overwritten. A record deleted by an earlier decision
   * in the same batch is reported as not found.
   */
  async bulkSetStatus(
    principal: Principal,
    ids: string[],
    status: SettableStatus,
  ): Promise<BulkStatusResult> {
    assertCanDecide(principal);
    const records = await this.loadScoped(principal, ids);

    const result: BulkStatusResult = {
      updated: 0,
      removed: [],
      rejected: this.missingIds(ids, records),
    };

    const decision = DECISION_FOR_STATUS[status];
    for (const record of records) {
      if (result.removed.includes(record.id)) {
        result.rejected.push({ id: record.id, reason: 'not_found' });
        continue;
      }
      if (decision && this.isLinkedReschedule(record)) {
        const outcome = await this.rescheduleService.applyDecision(record, decision);
        if (outcome.appointment) result.updated += 1;
        result.removed.push(outcome.removedId);
        continue;
      }

      try {
        await this.db
          .update(appointments)
          .set({ status, updatedAt: new Date() })
          .where(eq(appointments.id, record.id));
        result.updated += 1;
      } catch (error) {
        if (!isUniqueViolation(error)) throw error;
        result.rejected.push({ id: record.id, reason: 'taken' });
      }
    }

    this.logger.log(
      `Set ${result.updated} appointments to ${status}, removed ${result.removed.length}`,
    );
    return result;
  }

  async cancelSlots(
    principal: Principal,
    ids: string[],
  ): Promise<CancelSlotsResult> {
    const records = await this.loadScoped(principal, ids);
    const result: CancelSlotsResult = { cancelled: 0, removed: [] };

    for (const record of records) {
      if (record.status === 'cancelled') continue;

      if (this.isLinkedReschedule(record)) {
        const outcome = await this.rescheduleService.applyDecision(record, 'cancel');
        result.removed.push(outcome.removedId);
        continue;
      }

      await this.db
        .update(appointments)
        .set({ status: 'cancelled', updatedAt: new Date() })
        .where(eq(appointments.id, record.id));
      result.cancelled += 1;
    }

    this.logger.log(
      `Cancelled ${result.cancelled} appointments, removed ${result.removed.length} reschedule requests`,
    );
    return result;
  }

  /** Records among `ids` the principal is a party to, earliest first. */
  private async loadScoped(
    principal: Principal,
    ids: string[],
  ): Promise<AppointmentRow[]> {
    const uniqueIds = [...new Set(ids)];
    const rows = await this.db
      .select()
      .from(appointments)
      .where(inArray(appointments.id, uniqueIds))
      .orderBy(asc(appointments.scheduledFor));

    const scoped = rows.filter((row) => canAccessBooking(principal, row));
    if (scoped.length === 0) {
      throw new NotFoundError('No matching appointments', { ids: uniqueIds });
    }
    return scoped;
  }

  private missingIds(
    ids: string[],
    found: AppointmentRow[],
  ): BulkStatusResult['rejected'] {
    const foundIds = new Set(found.map((record) => record.id));
    return [...new Set(ids)]
      .filter((id) => !foundIds.has(id))
      .map((id) => ({ id, reason: 'not_found' as const }));
  }

  private isLinkedReschedule(record: AppointmentRow): boolean {
    return record.rescheduledFromId !== null;
  }

  private parseRequestedStart(
    value: string,
    date: string,
    timezone: string,
  ): Date | null {
    let start: Date;
    try {
      start = parseLocalDateTime(value, timezone);
    } catch (error) {
      if (error instanceof ValidationError) return null;
      throw error;
    }
    return localPosition(start, timezone).date === date ? start : null;
  }

  private resolveView(
    principal: Principal,
    params: ListBlocksParams,
  ): ViewScope {
    const view =
      params.view ??
      (principal.role === 'admin' ? undefined : principal.role);

    switch (view) {
      case 'patient':
        return {
          view,
          patientId: actingPatientId(principal, params.patientId),
        };
      case 'doctor':
        return {
          view,
          doctorId: actingDoctorId(principal, params.doctorId),
        };
      case undefined:
        throw new ValidationError('view is required when acting as admin');
    }
  }
}
