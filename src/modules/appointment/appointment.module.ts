import { Module } from '@nestjs/common';
import { AvailabilityModule } from '../availability/availability.module.js';
import { DoctorModule } from '../doctor/doctor.module.js';
import { PaymentModule } from '../payment/payment.module.js';
import { AppointmentController } from './appointment.controller.js';
import { AppointmentService } from './appointment.service.js';
import { RescheduleService } from './services/reschedule.service.js';

@Module({
  imports: [AvailabilityModule, DoctorModule, PaymentModule],
  controllers: [AppointmentController],
  providers: [AppointmentService, RescheduleService],
})
export class AppointmentModule {}
