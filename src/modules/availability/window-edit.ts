import {
  SLOT_MINUTES,
  formatTimeOfDay,
  parseTimeOfDay,
} from '../../common/time/zoned-time.js';

export interface WindowSpan {
  id: number;
  startTime: string;
  endTime: string;
}

export interface TimeRange {
  startTime: string;
  endTime: string;
}

/** How a window changes when one slot is taken out of it. */
export type SlotRemoval =
  | { kind: 'delete'; windowId: number }
  | { kind: 'shrink'; windowId: number; next: TimeRange }
  | { kind: 'split'; windowId: number; head: TimeRange; tail: TimeRange };

/**
 * The window that offers the slot starting at `slotMinute`: the slot lies
 * inside the window and on its half-hour grid.
 */
export function findWindowForSlot<T extends WindowSpan>(
  windows: readonly T[],
  slotMinute: number,
): T | undefined {
  const slotEnd = slotMinute + SLOT_MINUTES;
  return windows.find((window) => {
    const start = parseTimeOfDay(window.startTime);
    return (
      start <= slotMinute &&
      slotEnd <= parseTimeOfDay(window.endTime) &&
      (slotMinute - start) % SLOT_MINUTES === 0
    );
  });
}

export function planSlotRemoval(
  window: WindowSpan,
  slotMinute: number,
): SlotRemoval {
  const start = parseTimeOfDay(window.startTime);
  const end = parseTimeOfDay(window.endTime);
  const slotEnd = slotMinute + SLOT_MINUTES;

  if (start === slotMinute && end === slotEnd) {
    return { kind: 'delete', windowId: window.id };
  }
  if (start === slotMinute) {
    return {
      kind: 'shrink',
      windowId: window.id,
      next: { startTime: formatTimeOfDay(slotEnd), endTime: formatTimeOfDay(end) },
    };
  }
  if (end === slotEnd) {
    return {
      kind: 'shrink',
      windowId: window.id,
      next: { startTime: formatTimeOfDay(start), endTime: formatTimeOfDay(slotMinute) },
    };
  }
  return {
    kind: 'split',
    windowId: window.id,
    head: { startTime: formatTimeOfDay(start), endTime: formatTimeOfDay(slotMinute) },
    tail: { startTime: formatTimeOfDay(slotEnd), endTime: formatTimeOfDay(end) },
  };
}
