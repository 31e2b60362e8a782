import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, and, asc, gte, lte, inArray, sql } from 'drizzle-orm';
import { addMinutes } from 'date-fns';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
  type Executor,
  type Transaction,
} from '../../database/database.module.js';
import {
  availabilityWindows,
  type AvailabilityWindowRow,
} from '../../database/schema/index.js';
import {
  ConflictError,
  NotFoundError,
  StateError,
  ValidationError,
} from '../../common/errors/scheduling.errors.js';
import {
  SLOT_MINUTES,
  formatTimeOfDay,
  localDayRange,
  localPosition,
  parseIsoDate,
  parseLocalDateTime,
  parseTimeOfDay,
} from '../../common/time/zoned-time.js';
import { actingDoctorId } from '../auth/access-policy.js';
import type { Principal } from '../auth/principal.js';
import { DoctorService } from '../doctor/doctor.service.js';
import { SlotOccupancyService } from './services/slot-occupancy.service.js';
import {
  containsSlotStart,
  generateSlots,
  type Slot,
} from './slot-generator.js';
import {
  findWindowForSlot,
  planSlotRemoval,
  type SlotRemoval,
} from './window-edit.js';

export interface UpsertWindowParams {
  doctorId?: string;
  date: string;
  startTime: string;
  endTime: string;
}

export interface UpsertWindowResult {
  window: AvailabilityWindowRow;
  created: boolean;
}

export interface ListWindowsParams {
  doctorId?: string;
  from?: string;
  to?: string;
}

export interface DeleteSlotResult {
  slot: Slot;
  change: SlotRemoval;
}

@Injectable()
export class AvailabilityService {
  private readonly logger = new Logger(AvailabilityService.name);

  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
    private readonly doctorService: DoctorService,
    private readonly occupancy: SlotOccupancyService,
  ) {}

  /** Bookable slots of one doctor on one local date. */
  async listSlots(
    doctorId: string,
    date: string,
    timezone: string,
  ): Promise<Slot[]> {
    parseIsoDate(date);
    await this.doctorService.getActive(doctorId);

    const windows = await this.windowsOn(doctorId, date);
    const day = localDayRange(date, timezone);
    const booked = await this.occupancy.bookedStarts(
      doctorId,
      day.start,
      day.end,
    );

    return generateSlots({
      date,
      timezone,
      now: new Date(),
      windows,
      booked,
    });
  }

  /**
   * Whether one of the doctor's windows produces a future slot starting at
   * `start`, booked or not.
   */
  async offersSlot(
    doctorId: string,
    start: Date,
    timezone: string,
  ): Promise<boolean> {
    const { date } = localPosition(start, timezone);
    const windows = await this.windowsOn(doctorId, date);
    const slots = generateSlots({
      date,
      timezone,
      now: new Date(),
      windows,
      booked: [],
    });
    return containsSlotStart(slots, start);
  }

  async listWindows(
    principal: Principal,
    params: ListWindowsParams,
  ): Promise<AvailabilityWindowRow[]> {
    const doctorId = actingDoctorId(principal, params.doctorId);
    const conditions = [eq(availabilityWindows.doctorId, doctorId)];
    if (params.from) {
      conditions.push(gte(availabilityWindows.date, parseIsoDate(params.from)));
    }
    if (params.to) {
      conditions.push(lte(availabilityWindows.date, parseIsoDate(params.to)));
    }

    return this.db
      .select()
      .from(availabilityWindows)
      .where(and(...conditions))
      .orderBy(asc(availabilityWindows.date), asc(availabilityWindows.startTime));
  }

  /**
   * Replaces every window the doctor has on `date` with one window. The
   * earliest existing row is updated in place so its id survives.
   */
  async upsertWindow(
    principal: Principal,
    params: UpsertWindowParams,
  ): Promise<UpsertWindowResult> {
    const doctorId = actingDoctorId(principal, params.doctorId);
    const date = parseIsoDate(params.date);
    const start = parseTimeOfDay(params.startTime);
    const end = parseTimeOfDay(params.endTime);
    if (start >= end) {
      throw new ValidationError('Window start must be before its end', {
        startTime: params.startTime,
        endTime: params.endTime,
      });
    }
    await this.doctorService.getActive(doctorId);

    const startTime = formatTimeOfDay(start);
    const endTime = formatTimeOfDay(end);

    const result = await this.withWindowLock(doctorId, date, async (tx) => {
      const existing = await this.windowsOn(doctorId, date, tx);
      const [first, ...rest] = existing;

      if (!first) {
        const [window] = await tx
          .insert(availabilityWindows)
          .values({ doctorId, date, startTime, endTime })
          .returning();
        return { window, created: true };
      }

      if (rest.length > 0) {
        await tx.delete(availabilityWindows).where(
          inArray(
            availabilityWindows.id,
            rest.map((window) => window.id),
          ),
        );
      }
      const [window] = await tx
        .update(availabilityWindows)
        .set({ startTime, endTime, updatedAt: new Date() })
        .where(eq(availabilityWindows.id, first.id))
        .returning();
      return { window, created: false };
    });

    this.logger.log(
      `${result.created ? 'Created' : 'Updated'} window ${startTime}-${endTime} for doctor ${doctorId} on ${date}`,
    );
    return result;
  }

  /** Takes one 30-minute slot out of the window that offers it. */
  async deleteSlot(
    principal: Principal,
    doctorId: string | undefined,
    slotStart: string,
    timezone: string,
  ): Promise<DeleteSlotResult> {
    const actingId = actingDoctorId(principal, doctorId);
    const start = parseLocalDateTime(slotStart, timezone);
    if (start.getTime() <= Date.now()) {
      throw new StateError('Cannot delete a slot in the past', { slotStart });
    }
    const { date, minutes } = localPosition(start, timezone);

    const change = await this.withWindowLock(actingId, date, async (tx) => {
      const occupant = await this.occupancy.findOccupant(actingId, start, tx);
      if (occupant) {
        this.logger.warn(
          `Refused to delete booked slot ${slotStart} for doctor ${actingId}`,
        );
        throw new ConflictError('Cannot delete a booked slot', {
          slotStart,
          appointmentId: occupant.appointmentId,
        });
      }

      const windows = await this.windowsOn(actingId, date, tx);
      const window = findWindowForSlot(windows, minutes);
      if (!window) {
        throw new NotFoundError('No availability window offers this slot', {
          slotStart,
        });
      }

      const plan = planSlotRemoval(window, minutes);
      await this.applyRemoval(tx, actingId, date, plan);
      return plan;
    });

    this.logger.log(
      `Removed slot ${slotStart} for doctor ${actingId} (${change.kind})`,
    );
    return { slot: { start, end: addMinutes(start, SLOT_MINUTES) }, change };
  }

  private async windowsOn(
    doctorId: string,
    date: string,
    executor: Executor = this.db,
  ): Promise<AvailabilityWindowRow[]> {
    return executor
      .select()
      .from(availabilityWindows)
      .where(
        and(
          eq(availabilityWindows.doctorId, doctorId),
          eq(availabilityWindows.date, date),
        ),
      )
      .orderBy(asc(availabilityWindows.startTime));
  }

  private async applyRemoval(
    tx: Transaction,
    doctorId: string,
    date: string,
    plan: SlotRemoval,
  ): Promise<void> {
    switch (plan.kind) {
      case 'delete':
        await tx
          .delete(availabilityWindows)
          .where(eq(availabilityWindows.id, plan.windowId));
        return;
      case 'shrink':
        await tx
          .update(availabilityWindows)
          .set({ ...plan.next, updatedAt: new Date() })
          .where(eq(availabilityWindows.id, plan.windowId));
        return;
      case 'split':
        await tx
          .update(availabilityWindows)
          .set({ ...plan.head, updatedAt: new Date() })
          .where(eq(availabilityWindows.id, plan.windowId));
        await tx
          .insert(availabilityWindows)
          .values({ doctorId, date, ...plan.tail });
        return;
    }
  }

  /** Serializes edits of one doctor's day behind a transaction-scoped lock. */
  private withWindowLock<T>(
    doctorId: string,
    date: string,
    work: (tx: Transaction) => Promise<T>,
  ): Promise<T> {
    const key = `availability:${doctorId}:${date}`;
    return this.db.transaction(async (tx) => {
      await tx.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`);
      return work(tx);
    });
  }
}
