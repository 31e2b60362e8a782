import { Module } from '@nestjs/common';
import { DoctorModule } from '../doctor/doctor.module.js';
import { AvailabilityController } from './availability.controller.js';
import { AvailabilityService } from './availability.service.js';
import { SlotOccupancyService } from './services/slot-occupancy.service.js';

@Module({
  imports: [DoctorModule],
  controllers: [AvailabilityController],
  providers: [AvailabilityService, SlotOccupancyService],
  exports: [AvailabilityService, SlotOccupancyService],
})
export class AvailabilityModule {}
