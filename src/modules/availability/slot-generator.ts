import { addMinutes } from 'date-fns';
import {
  SLOT_MINUTES,
  parseTimeOfDay,
  zonedInstant,
} from '../../common/time/zoned-time.js';

export interface WindowBounds {
  startTime: string;
  endTime: string;
}

export interface Slot {
  start: Date;
  end: Date;
}

export interface SlotGenerationInput {
  date: string;
  timezone: string;
  now: Date;
  windows: readonly WindowBounds[];
  booked: Iterable<Date>;
}

/**
 * Every bookable 30-minute slot of a doctor's day.
 *
 * Windows are walked in start-time order from their own start, so slots stay
 * aligned to the window that produced them. A tail shorter than one slot is
 * dropped. Slots starting at or before `now`, or at a booked start, are
 * skipped.
 */
export function generateSlots(input: SlotGenerationInput): Slot[] {
  const booked = new Set<number>();
  for (const instant of input.booked) booked.add(instant.getTime());

  const ordered = input.windows
    .map((window) => ({
      start: parseTimeOfDay(window.startTime),
      end: parseTimeOfDay(window.endTime),
    }))
    .sort((a, b) => a.start - b.start);

  const now = input.now.getTime();
  const slots: Slot[] = [];

  for (const window of ordered) {
    for (
      let minute = window.start;
      minute + SLOT_MINUTES <= window.end;
      minute += SLOT_MINUTES
    ) {
      const start = zonedInstant(input.date, minute, input.timezone);
      if (start.getTime() <= now || booked.has(start.getTime())) continue;
      slots.push({ start, end: addMinutes(start, SLOT_MINUTES) });
    }
  }

  return slots;
}

export function containsSlotStart(slots: readonly Slot[], start: Date): boolean {
  return slots.some((slot) => slot.start.getTime() === start.getTime());
}
