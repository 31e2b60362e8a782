import { Injectable, Inject } from '@nestjs/common';
import { eq, and, gte, lt, inArray, asc } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
  type Executor,
} from '../../../database/database.module.js';
import {
  appointments,
  ACTIVE_APPOINTMENT_STATUSES,
  type AppointmentStatus,
} from '../../../database/schema/index.js';

export interface SlotOccupant {
  appointmentId: string;
  patientId: string;
  status: AppointmentStatus;
  scheduledFor: Date;
}

/**
 * Answers which active appointments hold a doctor's slot starts. "Active" is
 * ACTIVE_APPOINTMENT_STATUSES everywhere, matching the partial unique index.
 */
@Injectable()
export class SlotOccupancyService {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  /** Starts of active appointments in `[from, to)`. */
  async bookedStarts(
    doctorId: string,
    from: Date,
    to: Date,
    executor: Executor = this.db,
  ): Promise<Date[]> {
    const rows = await executor
      .select({ scheduledFor: appointments.scheduledFor })
      .from(appointments)
      .where(
        and(
          eq(appointments.doctorId, doctorId),
          gte(appointments.scheduledFor, from),
          lt(appointments.scheduledFor, to),
          inArray(appointments.status, [...ACTIVE_APPOINTMENT_STATUSES]),
        ),
      )
      .orderBy(asc(appointments.scheduledFor));

    return rows.map((row) => row.scheduledFor);
  }

  async findOccupant(
    doctorId: string,
    slotStart: Date,
    executor: Executor = this.db,
  ): Promise<SlotOccupant | null> {
    const [occupant] = await executor
      .select({
        appointmentId: appointments.id,
        patientId: appointments.patientId,
        status: appointments.status,
        scheduledFor: appointments.scheduledFor,
      })
      .from(appointments)
      .where(
        and(
          eq(appointments.doctorId, doctorId),
          eq(appointments.scheduledFor, slotStart),
          inArray(appointments.status, [...ACTIVE_APPOINTMENT_STATUSES]),
        ),
      )
      .limit(1);

    return occupant ?? null;
  }
}
