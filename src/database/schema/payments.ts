import {
  pgTable,
  uuid,
  varchar,
  integer,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const PAYMENT_STATUSES = ['created', 'pending', 'paid', 'failed'] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const payments = pgTable(
  'payments',
  {
    id: uuid().primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    amountCents: integer('amount_cents').notNull(),
    currency: varchar({ length: 10 }).notNull().default('usd'),
    providerReference: varchar('provider_reference', { length: 255 }).unique(),
    status: varchar({ length: 20, enum: PAYMENT_STATUSES })
      .notNull()
      .default('created'),
    description: varchar({ length: 255 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('idx_payments_user').on(table.userId)],
);

export type PaymentRow = typeof payments.$inferSelect;
