import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, and, gte, lt, asc } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../../database/database.module.js';
import {
  appointments,
  type AppointmentRow,
  type AppointmentStatus,
} from '../../../database/schema/index.js';
import {
  ConflictError,
  NotFoundError,
  StateError,
  ValidationError,
} from '../../../common/errors/scheduling.errors.js';
import { parseLocalDateTime } from '../../../common/time/zoned-time.js';
import { isUniqueViolation } from '../../../database/postgres-errors.js';
import {
  actingPatientId,
  assertCanDecide,
  canAccessBooking,
} from '../../auth/access-policy.js';
import type { Principal } from '../../auth/principal.js';
import { AvailabilityService } from '../../availability/availability.service.js';
import { SlotOccupancyService } from '../../availability/services/slot-occupancy.service.js';
import { DoctorService } from '../../doctor/doctor.service.js';

export const RESCHEDULE_DECISIONS = ['approve', 'reject', 'cancel'] as const;

export type RescheduleDecision = (typeof RESCHEDULE_DECISIONS)[number];

const RESCHEDULABLE: ReadonlySet<AppointmentStatus> = new Set([
  'requested',
  'approved',
  'reschedule_requested',
]);

export interface RescheduleRequestParams {
  patientId?: string;
  doctorId: string;
  blockStart: string;
  blockEnd: string;
  newSlotStart: string;
}

export interface DecisionResult {
  decision: RescheduleDecision;
  /** The promoted record on approval, null when the request was dropped. */
  appointment: AppointmentRow | null;
  removedId: string;
}

/**
 * A reschedule is a second record pointing at the original through
 * `rescheduledFromId`. Approval promotes it and deletes the original, any
 * other decision deletes the request.
 */
@Injectable()
export class RescheduleService {
  private readonly logger = new Logger(RescheduleService.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
    private readonly doctorService: DoctorService,
    private readonly availabilityService: AvailabilityService,
    private readonly occupancy: SlotOccupancyService,
  ) {}

  async requestReschedule(
    principal: Principal,
    params: RescheduleRequestParams,
    timezone: string,
  ): Promise<AppointmentRow> {
    const patientId = actingPatientId(principal, params.patientId);
    const blockStart = parseLocalDateTime(params.blockStart, timezone);
    const blockEnd = parseLocalDateTime(params.blockEnd, timezone);
    const newSlotStart = parseLocalDateTime(params.newSlotStart, timezone);
    if (blockStart.getTime() >= blockEnd.getTime()) {
      throw new ValidationError('Block start must be before its end');
    }

    const { doctorId } = params;
    await this.doctorService.getActive(doctorId);

    const records = await this.db
      .select()
      .from(appointments)
      .where(
        and(
          eq(appointments.patientId, patientId),
          eq(appointments.doctorId, doctorId),
          gte(appointments.scheduledFor, blockStart),
          lt(appointments.scheduledFor, blockEnd),
        ),
      )
      .orderBy(asc(appointments.scheduledFor));

    if (records.length === 0) {
      throw new NotFoundError('No appointment found in that block', {
        blockStart: params.blockStart,
        blockEnd: params.blockEnd,
      });
    }

    const now = Date.now();
    if (blockStart.getTime() <= now) {
      throw new StateError('Cannot reschedule an appointment that has started');
    }
    const [root] = records.filter((record) => RESCHEDULABLE.has(record.status));
    if (!root) {
      throw new StateError('No appointment in that block can be rescheduled', {
        statuses: records.map((record) => record.status),
      });
    }
    if (newSlotStart.getTime() <= now) {
      throw new StateError('The new slot is in the past', {
        newSlotStart: params.newSlotStart,
      });
    }

    const occupant = await this.occupancy.findOccupant(doctorId, newSlotStart);
    if (occupant) {
      throw new ConflictError('The new slot is already booked', {
        newSlotStart: params.newSlotStart,
      });
    }
    const offered = await this.availabilityService.offersSlot(
      doctorId,
      newSlotStart,
      timezone,
    );
    if (!offered) {
      throw new NotFoundError('The doctor does not offer the new slot', {
        newSlotStart: params.newSlotStart,
      });
    }

    try {
      const [requested] = await this.db
        .insert(appointments)
        .values({
          patientId,
          doctorId,
          scheduledFor: newSlotStart,
          reason: root.reason,
          status: 'reschedule_requested',
          rescheduledFromId: root.id,
        })
        .returning();

      this.logger.log(
        `Reschedule of ${root.id} to ${newSlotStart.toISOString()} requested as ${requested.id}`,
      );
      return requested;
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.logger.warn(
          `Reschedule target ${newSlotStart.toISOString()} was taken for doctor ${doctorId}`,
        );
        throw new ConflictError('The new slot is already booked', {
          newSlotStart: params.newSlotStart,
        });
      }
      throw error;
    }
  }

  async decideReschedule(
    principal: Principal,
    appointmentId: string,
    decision: RescheduleDecision,
  ): Promise<DecisionResult> {
    assertCanDecide(principal);

    const [record] = await this.db
      .select()
      .from(appointments)
      .where(eq(appointments.id, appointmentId));

    if (!record || !canAccessBooking(principal, record)) {
      throw new NotFoundError('Appointment not found', { appointmentId });
    }
    if (record.status !== 'reschedule_requested') {
      throw new StateError('Appointment is not a pending reschedule request', {
        appointmentId: record.id,
        status: record.status,
      });
    }
    return this.applyDecision(record, decision);
  }

  /**
   * Carries out a decision on a record the caller has already scoped. Any
   * record still linked to an original is decided, whatever its status.
   */
  async applyDecision(
    record: AppointmentRow,
    decision: RescheduleDecision,
  ): Promise<DecisionResult> {
    const originalId = record.rescheduledFromId;
    if (originalId === null) {
      throw new StateError('Appointment is not a pending reschedule request', {
        appointmentId: record.id,
        status: record.status,
      });
    }

    if (decision === 'approve') {
      const approved = await this.db.transaction(async (tx) => {
        await tx.delete(appointments).where(eq(appointments.id, originalId));
        const [updated] = await tx
          .update(appointments)
          .set({ status: 'approved', rescheduledFromId: null, updatedAt: new Date() })
          .where(eq(appointments.id, record.id))
          .returning();
        return updated;
      });

      this.logger.log(`Approved reschedule ${record.id}, removed ${originalId}`);
      return { decision, appointment: approved, removedId: originalId };
    }

    await this.db.delete(appointments).where(eq(appointments.id, record.id));
    this.logger.log(`Reschedule ${record.id} dropped (${decision})`);
    return { decision, appointment: null, removedId: record.id };
  }
}
