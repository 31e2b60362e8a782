import { Test, TestingModule } from '@nestjs/testing';
import { AppointmentController } from './appointment.controller';
import { AppointmentService } from './appointment.service';
import { RescheduleService } from './services/reschedule.service';
import {
  ConflictError,
  ValidationError,
} from '../../common/errors/scheduling.errors';
import type { Principal } from '../auth/principal';

describe('AppointmentController', () => {
  let controller: AppointmentController;
  const appointmentService = { createBlock: jest.fn() };
  const rescheduleService = { decideReschedule: jest.fn() };

  const patient: Principal = { role: 'patient', id: 'patient-1' };
  const body = {
    doctor_id: '7f2c1a3e-52d4-4c1b-9a57-2f4e8b0c6d11',
    date: '2099-01-05',
    slot_starts: ['2099-01-05T09:00', '2099-01-05T09:30'],
  };

  beforeEach(async () => {
    jest.resetAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppointmentController],
      providers: [
        { provide: AppointmentService, useValue: appointmentService },
        { provide: RescheduleService, useValue: rescheduleService },
      ],
    }).compile();

    controller = module.get<AppointmentController>(AppointmentController);
  });

  it('reports a partial booking as N of M booked', async () => {
    appointmentService.createBlock.mockResolvedValue({
      requested: 2,
      created: 1,
      appointments: [
        {
          id: 'a1',
          patientId: 'patient-1',
          doctorId: body.doctor_id,
          scheduledFor: new Date('2099-01-05T09:00:00Z'),
          status: 'requested',
          reason: null,
          paymentId: null,
          rescheduledFromId: null,
        },
      ],
      rejected: [{ slotStart: '2099-01-05T09:30', reason: 'taken' }],
    });

    const response = await controller.createBlock(patient, body, 'UTC');

    expect(response.message).toBe('1 of 2 booked');
    expect(response.appointments).toEqual([
      {
        id: 'a1',
        patient_id: 'patient-1',
        doctor_id: body.doctor_id,
        scheduled_for: '2099-01-05T09:00:00.000Z',
        status: 'requested',
        reason: null,
        payment_id: null,
        rescheduled_from_id: null,
      },
    ]);
    expect(response.rejected).toEqual([
      { slot_start: '2099-01-05T09:30', reason: 'taken' },
    ]);
    expect(appointmentService.createBlock).toHaveBeenCalledWith(
      patient,
      {
        patientId: undefined,
        doctorId: body.doctor_id,
        date: '2099-01-05',
        slotStarts: body.slot_starts,
        reason: undefined,
        paymentId: undefined,
      },
      'UTC',
    );
  });

  it('turns a booking with nothing created into a conflict', async () => {
    appointmentService.createBlock.mockResolvedValue({
      requested: 2,
      created: 0,
      appointments: [],
      rejected: [
        { slotStart: '2099-01-05T09:00', reason: 'unavailable' },
        { slotStart: '2099-01-05T09:30', reason: 'unavailable' },
      ],
    });

    await expect(controller.createBlock(patient, body, 'UTC')).rejects.toThrow(
      ConflictError,
    );
  });

  it('validates the body before booking', async () => {
    await expect(
      controller.createBlock(patient, { ...body, slot_starts: [] }, 'UTC'),
    ).rejects.toThrow(ValidationError);
    expect(appointmentService.createBlock).not.toHaveBeenCalled();
  });

  it('maps a reschedule decision', async () => {
    rescheduleService.decideReschedule.mockResolvedValue({
      decision: 'reject',
      appointment: null,
      removedId: 'a9',
    });

    await expect(
      controller.decideReschedule(patient, 'a9', { decision: 'reject' }),
    ).resolves.toEqual({ decision: 'reject', appointment: null, removed_id: 'a9' });
  });
});
