import { addMinutes } from 'date-fns';
import {
  SLOT_MINUTES,
  localPosition,
} from '../../common/time/zoned-time.js';
import type { AppointmentStatus, PaymentStatus } from '../../database/schema/index.js';

/** One stored 30-minute appointment record, with its payment status joined. */
export interface AppointmentSlot {
  id: string;
  doctorId: string;
  patientId: string;
  scheduledFor: Date;
  status: AppointmentStatus;
  reason: string | null;
  paymentId: string | null;
  paymentStatus: PaymentStatus | null;
  rescheduledFromId: string | null;
}

/** Contiguous same-attribute appointment records, shown as one booking. */
export interface AppointmentBlock {
  doctorId: string;
  patientId: string;
  date: string;
  start: Date;
  end: Date;
  status: AppointmentStatus;
  reason: string | null;
  paymentId: string | null;
  isPaid: boolean;
  rescheduledFromId: string | null;
  slotIds: string[];
  slots: AppointmentSlot[];
}

export interface GroupingOptions {
  timezone: string;
}

function openBlock(slot: AppointmentSlot, date: string): AppointmentBlock {
  return {
    doctorId: slot.doctorId,
    patientId: slot.patientId,
    date,
    start: slot.scheduledFor,
    end: addMinutes(slot.scheduledFor, SLOT_MINUTES),
    status: slot.status,
    reason: slot.reason,
    paymentId: slot.paymentId,
    isPaid: slot.paymentStatus === 'paid',
    rescheduledFromId: slot.rescheduledFromId,
    slotIds: [slot.id],
    slots: [slot],
  };
}

function continuesBlock(block: AppointmentBlock, slot: AppointmentSlot, date: string): boolean {
  const last = block.slots[block.slots.length - 1];
  return (
    slot.doctorId === block.doctorId &&
    slot.patientId === block.patientId &&
    date === block.date &&
    slot.status === block.status &&
    slot.reason === block.reason &&
    slot.paymentId === block.paymentId &&
    slot.rescheduledFromId === block.rescheduledFromId &&
    slot.scheduledFor.getTime() ===
      addMinutes(last.scheduledFor, SLOT_MINUTES).getTime()
  );
}

/**
 * Folds records into blocks. The input must already be ordered by the
 * counterpart (doctor for a patient's view, patient for a doctor's view) and
 * then by `scheduledFor`; only neighbours are ever merged.
 */
export function groupIntoBlocks(
  slots: readonly AppointmentSlot[],
  options: GroupingOptions,
): AppointmentBlock[] {
  const blocks: AppointmentBlock[] = [];
  let current: AppointmentBlock | undefined;

  for (const slot of slots) {
    const { date } = localPosition(slot.scheduledFor, options.timezone);

    if (current && continuesBlock(current, slot, date)) {
      current.slots.push(slot);
      current.slotIds.push(slot.id);
      current.end = addMinutes(slot.scheduledFor, SLOT_MINUTES);
      continue;
    }

    if (current) blocks.push(current);
    current = openBlock(slot, date);
  }

  if (current) blocks.push(current);
  return blocks;
}

export function ungroupBlock(block: AppointmentBlock): AppointmentSlot[] {
  return [...block.slots];
}
