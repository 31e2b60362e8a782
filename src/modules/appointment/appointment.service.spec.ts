import { Test, TestingModule } from '@nestjs/testing';
import { ForbiddenException } from '@nestjs/common';
import { AppointmentService } from './appointment.service';
import { RescheduleService } from './services/reschedule.service';
import { AvailabilityService } from '../availability/availability.service';
import { SlotOccupancyService } from '../availability/services/slot-occupancy.service';
import { DoctorService } from '../doctor/doctor.service';
import { PaymentService } from '../payment/payment.service';
import { DATABASE_CONNECTION } from '../../database/database.module';
import type { AppointmentStatus } from '../../database/schema';
import {
  NotFoundError,
  ValidationError,
} from '../../common/errors/scheduling.errors';
import type { Principal } from '../auth/principal';
import {
  createMockDatabase,
  mockQuery,
  uniqueViolation,
  type MockDatabase,
} from '../../../test/utils/mock-database';

describe('AppointmentService', () => {
  let service: AppointmentService;
  let mockDb: MockDatabase;

  const patient: Principal = { role: 'patient', id: 'patient-1' };
  const doctor: Principal = { role: 'doctor', id: 'doctor-1' };
  const doctorRow = { id: 'doctor-1', email: 'd@clinic.test', fullName: 'Dr. Test' };

  const window = (startTime: string, endTime: string) => ({
    id: 1,
    doctorId: 'doctor-1',
    date: '2099-01-05',
    startTime,
    endTime,
    createdAt: new Date('2098-12-01T00:00:00Z'),
    updatedAt: new Date('2098-12-01T00:00:00Z'),
  });

  const appointment = (
    id: string,
    scheduledFor: string,
    status: AppointmentStatus,
    rescheduledFromId: string | null = null,
  ) => ({
    id,
    patientId: 'patient-1',
    doctorId: 'doctor-1',
    scheduledFor: new Date(scheduledFor),
    reason: 'Checkup',
    status,
    paymentId: null,
    rescheduledFromId,
    createdAt: new Date('2098-12-01T00:00:00Z'),
    updatedAt: new Date('2098-12-01T00:00:00Z'),
  });

  beforeEach(async () => {
    mockDb = createMockDatabase();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AppointmentService,
        RescheduleService,
        AvailabilityService,
        SlotOccupancyService,
        DoctorService,
        PaymentService,
        { provide: DATABASE_CONNECTION, useValue: mockDb },
      ],
    }).compile();

    service = module.get<AppointmentService>(AppointmentService);
  });

  describe('createBlock', () => {
    it('books the bookable starts and reports the rest', async () => {
      const booked = appointment('a1', '2099-01-05T09:00:00Z', 'requested');
      const insert = mockQuery([booked]);
      mockDb.select
        .mockReturnValueOnce(mockQuery([doctorRow]))
        .mockReturnValueOnce(mockQuery([window('09:00:00', '10:00:00')]))
        .mockReturnValueOnce(
          mockQuery([{ scheduledFor: new Date('2099-01-05T09:30:00Z') }]),
        );
      mockDb.insert.mockReturnValueOnce(insert);

      const result = await service.createBlock(
        patient,
        {
          doctorId: 'doctor-1',
          date: '2099-01-05',
          slotStarts: [
            '2099-01-05T09:00',
            '2099-01-05T09:30',
            '2099-01-05T10:00',
            'bogus',
            '2099-01-06T09:00',
            '2099-01-05T09:00',
          ],
        },
        'UTC',
      );

      expect(result).toEqual({
        requested: 5,
        created: 1,
        appointments: [booked],
        rejected: [
          { slotStart: '2099-01-05T09:30', reason: 'unavailable' },
          { slotStart: '2099-01-05T10:00', reason: 'unavailable' },
          { slotStart: 'bogus', reason: 'invalid' },
          { slotStart: '2099-01-06T09:00', reason: 'invalid' },
        ],
      });
      expect(insert.values).toHaveBeenCalledWith({
        patientId: 'patient-1',
        doctorId: 'doctor-1',
        scheduledFor: new Date('2099-01-05T09:00:00Z'),
        reason: null,
        status: 'requested',
        paymentId: null,
      });
      expect(mockDb.insert).toHaveBeenCalledTimes(1);
    });

    it('reports a slot lost to a concurrent booking as taken', async () => {
      const booked = appointment('a2', '2099-01-05T09:30:00Z', 'requested');
      mockDb.select
        .mockReturnValueOnce(mockQuery([doctorRow]))
        .mockReturnValueOnce(mockQuery([window('09:00:00', '10:00:00')]))
        .mockReturnValueOnce(mockQuery([]));
      mockDb.insert
        .mockReturnValueOnce(mockQuery(uniqueViolation()))
        .mockReturnValueOnce(mockQuery([booked]));

      const result = await service.createBlock(
        patient,
        {
          doctorId: 'doctor-1',
          date: '2099-01-05',
          slotStarts: ['2099-01-05T09:00', '2099-01-05T09:30'],
        },
        'UTC',
      );

      expect(result.created).toBe(1);
      expect(result.appointments).toEqual([booked]);
      expect(result.rejected).toEqual([
        { slotStart: '2099-01-05T09:00', reason: 'taken' },
      ]);
    });

    it('requires the payment to belong to the patient', async () => {
      mockDb.select.mockReturnValueOnce(mockQuery([]));

      await expect(
        service.createBlock(
          patient,
          {
            doctorId: 'doctor-1',
            date: '2099-01-05',
            slotStarts: ['2099-01-05T09:00'],
            paymentId: 'payment-9',
          },
          'UTC',
        ),
      ).rejects.toThrow(NotFoundError);
      expect(mockDb.insert).not.toHaveBeenCalled();
    });

    it('is not open to doctors', async () => {
      await expect(
        service.createBlock(
          doctor,
          { doctorId: 'doctor-1', date: '2099-01-05', slotStarts: [] },
          'UTC',
        ),
      ).rejects.toThrow(ForbiddenException);
    });
  });

  describe('listBlocks', () => {
    it('groups the patient records into blocks', async () => {
      const slot = (id: string, scheduledFor: string) => ({
        id,
        doctorId: 'doctor-1',
        patientId: 'patient-1',
        scheduledFor: new Date(scheduledFor),
        status: 'approved',
        reason: 'Checkup',
        paymentId: 'payment-1',
        paymentStatus: 'paid',
        rescheduledFromId: null,
      });
      const query = mockQuery([
        slot('a1', '2099-01-05T09:00:00Z'),
        slot('a2', '2099-01-05T09:30:00Z'),
      ]);
      mockDb.select.mockReturnValueOnce(query);

      const blocks = await service.listBlocks(patient, {}, 'UTC');

      expect(blocks).toHaveLength(1);
      expect(blocks[0].slotIds).toEqual(['a1', 'a2']);
      expect(blocks[0].start).toEqual(new Date('2099-01-05T09:00:00Z'));
      expect(blocks[0].end).toEqual(new Date('2099-01-05T10:00:00Z'));
      expect(blocks[0].isPaid).toBe(true);
      expect(query.leftJoin).toHaveBeenCalledTimes(1);
    });

    it('needs a view when acting as admin', async () => {
      await expect(
        service.listBlocks({ role: 'admin', id: 'admin-1' }, {}, 'UTC'),
      ).rejects.toThrow(ValidationError);
    });

    it('keeps patients out of the doctor view', async () => {
      await expect(
        service.listBlocks(patient, { view: 'doctor' }, 'UTC'),
      ).rejects.toThrow(ForbiddenException);
    });
  });

  describe('bulkSetStatus', () => {
    it('sets plain records in place and decides reschedule requests', async () => {
      const approved = appointment('a2', '2099-01-06T11:00:00Z', 'approved');
      const promote = mockQuery([approved]);
      const setInPlace = mockQuery([]);
      mockDb.select.mockReturnValueOnce(
        mockQuery([
          appointment('a1', '2099-01-05T09:00:00Z', 'requested'),
          appointment('a2', '2099-01-06T11:00:00Z', 'reschedule_requested', 'a0'),
        ]),
      );
      mockDb.update
        .mockReturnValueOnce(setInPlace)
        .mockReturnValueOnce(promote);

      const result = await service.bulkSetStatus(
        doctor,
        ['a1', 'a2', 'missing'],
        'approved',
      );

      expect(result).toEqual({
        updated: 2,
        removed: ['a0'],
        rejected: [{ id: 'missing', reason: 'not_found' }],
      });
      expect(setInPlace.set).toHaveBeenCalledWith({
        status: 'approved',
        updatedAt: expect.any(Date),
      });
      expect(mockDb.transaction).toHaveBeenCalledTimes(1);
      expect(mockDb.delete).toHaveBeenCalledTimes(1);
    });

    it('decides a linked record even after its status was changed', async () => {
      const approved = appointment('a2', '2099-01-06T11:00:00Z', 'approved');
      const promote = mockQuery([approved]);
      const removeOriginal = mockQuery([]);
      mockDb.select.mockReturnValueOnce(
        mockQuery([
          appointment('a2', '2099-01-06T11:00:00Z', 'requested', 'a0'),
        ]),
      );
      mockDb.delete.mockReturnValueOnce(removeOriginal);
      mockDb.update.mockReturnValueOnce(promote);

      const result = await service.bulkSetStatus(doctor, ['a2'], 'approved');

      expect(result).toEqual({ updated: 1, removed: ['a0'], rejected: [] });
      expect(mockDb.transaction).toHaveBeenCalledTimes(1);
      expect(removeOriginal.where).toHaveBeenCalledTimes(1);
      expect(promote.set).toHaveBeenCalledWith({
        status: 'approved',
        rescheduledFromId: null,
        updatedAt: expect.any(Date),
      });
    });

    it('skips an original already removed earlier in the batch', async () => {
      const approved = appointment('r1', '2099-01-05T08:00:00Z', 'approved');
      mockDb.select.mockReturnValueOnce(
        mockQuery([
          appointment('r1', '2099-01-05T08:00:00Z', 'reschedule_requested', 'o1'),
          appointment('o1', '2099-01-05T09:00:00Z', 'requested'),
        ]),
      );
      mockDb.update.mockReturnValueOnce(mockQuery([approved]));

      const result = await service.bulkSetStatus(
        doctor,
        ['r1', 'o1'],
        'approved',
      );

      expect(result).toEqual({
        updated: 1,
        removed: ['o1'],
        rejected: [{ id: 'o1', reason: 'not_found' }],
      });
      expect(mockDb.update).toHaveBeenCalledTimes(1);
      expect(mockDb.delete).toHaveBeenCalledTimes(1);
    });

    it('reports a record whose slot was retaken as taken', async () => {
      mockDb.select.mockReturnValueOnce(
        mockQuery([appointment('a1', '2099-01-05T09:00:00Z', 'cancelled')]),
      );
      mockDb.update.mockReturnValueOnce(mockQuery(uniqueViolation()));

      const result = await service.bulkSetStatus(doctor, ['a1'], 'requested');

      expect(result).toEqual({
        updated: 0,
        removed: [],
        rejected: [{ id: 'a1', reason: 'taken' }],
      });
    });

    it('throws NotFoundError when no record is in scope', async () => {
      mockDb.select.mockReturnValueOnce(
        mockQuery([
          {
            ...appointment('a1', '2099-01-05T09:00:00Z', 'requested'),
            doctorId: 'doctor-2',
          },
        ]),
      );

      await expect(
        service.bulkSetStatus(doctor, ['a1'], 'approved'),
      ).rejects.toThrow(NotFoundError);
      expect(mockDb.update).not.toHaveBeenCalled();
    });

    it('is not open to patients', async () => {
      await expect(
        service.bulkSetStatus(patient, ['a1'], 'approved'),
      ).rejects.toThrow(ForbiddenException);
    });
  });

  describe('cancelSlots', () => {
    it('cancels active records and drops pending reschedule requests', async () => {
      const cancel = mockQuery([]);
      mockDb.select.mockReturnValueOnce(
        mockQuery([
          appointment('a1', '2099-01-05T09:00:00Z', 'requested'),
          appointment('a2', '2099-01-05T09:30:00Z', 'cancelled'),
          appointment('a3', '2099-01-06T11:00:00Z', 'reschedule_requested', 'a1'),
        ]),
      );
      mockDb.update.mockReturnValueOnce(cancel);

      const result = await service.cancelSlots(patient, ['a1', 'a2', 'a3']);

      expect(result).toEqual({ cancelled: 1, removed: ['a3'] });
      expect(cancel.set).toHaveBeenCalledWith({
        status: 'cancelled',
        updatedAt: expect.any(Date),
      });
      expect(mockDb.update).toHaveBeenCalledTimes(1);
      expect(mockDb.delete).toHaveBeenCalledTimes(1);
    });
  });
});
