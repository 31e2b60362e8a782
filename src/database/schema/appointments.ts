import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  index,
  uniqueIndex,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users.js';
import { payments } from './payments.js';

export const APPOINTMENT_STATUSES = [
  'requested',
  'approved',
  'rejected',
  'completed',
  'cancelled',
  'reschedule_requested',
  'rescheduled',
] as const;

export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

/**
 * Statuses that occupy their doctor/time pair. Every conflict check, the
 * booked-slot listing and the partial unique index below use this set.
 */
export const ACTIVE_APPOINTMENT_STATUSES = [
  'requested',
  'approved',
  'reschedule_requested',
  'rescheduled',
  'completed',
] as const satisfies readonly AppointmentStatus[];

export const appointments = pgTable(
  'appointments',
  {
    id: uuid().primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    doctorId: uuid('doctor_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    scheduledFor: timestamp('scheduled_for', { withTimezone: true }).notNull(),
    reason: text(),
    status: varchar({ length: 20, enum: APPOINTMENT_STATUSES })
      .notNull()
      .default('requested'),
    paymentId: uuid('payment_id').references(() => payments.id, {
      onDelete: 'set null',
    }),
    rescheduledFromId: uuid('rescheduled_from_id').references(
      (): AnyPgColumn => appointments.id,
      { onDelete: 'set null' },
    ),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_appt_doctor_slot_active')
      .on(table.doctorId, table.scheduledFor)
      .where(sql`status NOT IN ('cancelled', 'rejected')`),
    index('idx_appt_doctor_time').on(table.doctorId, table.scheduledFor),
    index('idx_appt_patient_time').on(table.patientId, table.scheduledFor),
  ],
);

export type AppointmentRow = typeof appointments.$inferSelect;
