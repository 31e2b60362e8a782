import {
  pgTable,
  bigserial,
  uuid,
  date,
  time,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const availabilityWindows = pgTable(
  'availability_windows',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    doctorId: uuid('doctor_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    date: date({ mode: 'string' }).notNull(),
    startTime: time('start_time').notNull(),
    endTime: time('end_time').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_windows_doctor_date').on(
      table.doctorId,
      table.date,
      table.startTime,
    ),
  ],
);

export type AvailabilityWindowRow = typeof availabilityWindows.$inferSelect;
