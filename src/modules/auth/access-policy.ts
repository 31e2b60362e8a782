import { ForbiddenException } from '@nestjs/common';
import { ValidationError } from '../../common/errors/scheduling.errors.js';
import type { Principal } from './principal.js';

export interface BookingParties {
  patientId: string;
  doctorId: string;
}

/**
 * The doctor a principal may act for. Doctors act for themselves, admins must
 * name the doctor, patients never manage a doctor's schedule.
 */
export function actingDoctorId(
  principal: Principal,
  requestedDoctorId?: string,
): string {
  switch (principal.role) {
    case 'doctor':
      if (requestedDoctorId && requestedDoctorId !== principal.id) {
        throw new ForbiddenException('Doctors can only manage their own schedule');
      }
      return principal.id;
    case 'admin':
      if (!requestedDoctorId) {
        throw new ValidationError('doctor_id is required when acting as admin');
      }
      return requestedDoctorId;
    case 'patient':
      throw new ForbiddenException('Patients cannot manage doctor schedules');
  }
}

/** The patient a principal may book or reschedule for. */
export function actingPatientId(
  principal: Principal,
  requestedPatientId?: string,
): string {
  switch (principal.role) {
    case 'patient':
      if (requestedPatientId && requestedPatientId !== principal.id) {
        throw new ForbiddenException('Patients can only book for themselves');
      }
      return principal.id;
    case 'admin':
      if (!requestedPatientId) {
        throw new ValidationError('patient_id is required when acting as admin');
      }
      return requestedPatientId;
    case 'doctor':
      throw new ForbiddenException('Doctors cannot book appointments for patients');
  }
}

/** Whether the principal is a party to the booking (admins always are). */
export function canAccessBooking(
  principal: Principal,
  booking: BookingParties,
): boolean {
  switch (principal.role) {
    case 'patient':
      return booking.patientId === principal.id;
    case 'doctor':
      return booking.doctorId === principal.id;
    case 'admin':
      return true;
  }
}

/** Only doctors (and admins) decide on bookings. */
export function assertCanDecide(principal: Principal): void {
  if (principal.role === 'patient') {
    throw new ForbiddenException('Only doctors can change appointment status');
  }
}

/** Provider callbacks are relayed by a trusted back office account. */
export function assertAdmin(principal: Principal): void {
  if (principal.role !== 'admin') {
    throw new ForbiddenException('Admin access required');
  }
}
