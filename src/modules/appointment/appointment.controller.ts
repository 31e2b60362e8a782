import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiHeader,
  ApiOperation,
  ApiQuery,
  ApiTags,
} from '@nestjs/swagger';
import { addMinutes } from 'date-fns';
import { ConflictError } from '../../common/errors/scheduling.errors.js';
import { SLOT_MINUTES } from '../../common/time/zoned-time.js';
import { RequestTimezone } from '../../common/decorators/request-timezone.decorator.js';
import { TIMEZONE_HEADER } from '../../common/middleware/timezone.middleware.js';
import { parseRequest } from '../../common/validation/parse-request.js';
import type { AppointmentRow } from '../../database/schema/index.js';
import { CurrentUser } from '../auth/decorators/current-user.decorator.js';
import { JwtAuthGuard } from '../auth/jwt-auth.guard.js';
import type { Principal } from '../auth/principal.js';
import { AppointmentService } from './appointment.service.js';
import type { AppointmentBlock } from './block-grouper.js';
import { CancelSlotsSchema } from './dto/cancel-slots.dto.js';
import { CreateBlockSchema } from './dto/create-block.dto.js';
import { DecideRescheduleSchema } from './dto/decide-reschedule.dto.js';
import { ListBlocksSchema } from './dto/list-blocks.dto.js';
import { RequestRescheduleSchema } from './dto/request-reschedule.dto.js';
import { SetStatusSchema } from './dto/set-status.dto.js';
import { RescheduleService } from './services/reschedule.service.js';

function toAppointmentResponse(appointment: AppointmentRow) {
  return {
    id: appointment.id,
    patient_id: appointment.patientId,
    doctor_id: appointment.doctorId,
    scheduled_for: appointment.scheduledFor.toISOString(),
    status: appointment.status,
    reason: appointment.reason,
    payment_id: appointment.paymentId,
    rescheduled_from_id: appointment.rescheduledFromId,
  };
}

function toBlockResponse(block: AppointmentBlock) {
  return {
    doctor_id: block.doctorId,
    patient_id: block.patientId,
    date: block.date,
    start: block.start.toISOString(),
    end: block.end.toISOString(),
    status: block.status,
    reason: block.reason,
    payment_id: block.paymentId,
    is_paid: block.isPaid,
    rescheduled_from_id: block.rescheduledFromId,
    slot_ids: block.slotIds,
    slots: block.slots.map((slot) => ({
      id: slot.id,
      start: slot.scheduledFor.toISOString(),
      end: addMinutes(slot.scheduledFor, SLOT_MINUTES).toISOString(),
    })),
  };
}

@ApiTags('Appointments')
@ApiBearerAuth()
@ApiHeader({ name: TIMEZONE_HEADER, required: false, description: 'IANA timezone' })
@UseGuards(JwtAuthGuard)
@Controller('appointments')
export class AppointmentController {
  constructor(
    private readonly appointmentService: AppointmentService,
    private readonly rescheduleService: RescheduleService,
  ) {}

  @Post('blocks')
  @ApiOperation({ summary: 'Book consecutive slots with a doctor' })
  async createBlock(
    @CurrentUser() principal: Principal,
    @Body() body: unknown,
    @RequestTimezone() timezone: string,
  ) {
    const params = parseRequest(CreateBlockSchema, body);
    const result = await this.appointmentService.createBlock(
      principal,
      {
        patientId: params.patient_id,
        doctorId: params.doctor_id,
        date: params.date,
        slotStarts: params.slot_starts,
        reason: params.reason,
        paymentId: params.payment_id,
      },
      timezone,
    );

    const rejected = result.rejected.map((entry) => ({
      slot_start: entry.slotStart,
      reason: entry.reason,
    }));
    if (result.created === 0) {
      throw new ConflictError('Selected slots unavailable', { rejected });
    }

    return {
      message: `${result.created} of ${result.requested} booked`,
      requested: result.requested,
      created: result.created,
      appointments: result.appointments.map(toAppointmentResponse),
      rejected,
    };
  }

  @Get('blocks')
  @ApiOperation({ summary: 'List bookings grouped into contiguous blocks' })
  @ApiQuery({ name: 'view', enum: ['patient', 'doctor'], required: false })
  @ApiQuery({ name: 'doctor_id', type: String, required: false })
  @ApiQuery({ name: 'patient_id', type: String, required: false })
  async listBlocks(
    @CurrentUser() principal: Principal,
    @Query() query: unknown,
    @RequestTimezone() timezone: string,
  ) {
    const params = parseRequest(ListBlocksSchema, query);
    const blocks = await this.appointmentService.listBlocks(
      principal,
      {
        view: params.view,
        doctorId: params.doctor_id,
        patientId: params.patient_id,
      },
      timezone,
    );
    return { timezone, blocks: blocks.map(toBlockResponse) };
  }

  @Patch('status')
  @ApiOperation({ summary: 'Set the status of several appointment slots' })
  async setStatus(@CurrentUser() principal: Principal, @Body() body: unknown) {
    const params = parseRequest(SetStatusSchema, body);
    return this.appointmentService.bulkSetStatus(
      principal,
      params.slot_ids,
      params.status,
    );
  }

  @Post('cancel')
  @HttpCode(200)
  @ApiOperation({ summary: 'Cancel appointment slots' })
  async cancel(@CurrentUser() principal: Principal, @Body() body: unknown) {
    const params = parseRequest(CancelSlotsSchema, body);
    return this.appointmentService.cancelSlots(principal, params.slot_ids);
  }

  @Post('reschedule')
  @ApiOperation({ summary: 'Ask to move a booking to another slot' })
  async requestReschedule(
    @CurrentUser() principal: Principal,
    @Body() body: unknown,
    @RequestTimezone() timezone: string,
  ) {
    const params = parseRequest(RequestRescheduleSchema, body);
    const requested = await this.rescheduleService.requestReschedule(
      principal,
      {
        patientId: params.patient_id,
        doctorId: params.doctor_id,
        blockStart: params.block_start,
        blockEnd: params.block_end,
        newSlotStart: params.new_slot_start,
      },
      timezone,
    );
    return toAppointmentResponse(requested);
  }

  @Post(':id/reschedule-decision')
  @HttpCode(200)
  @ApiOperation({ summary: 'Approve, reject or cancel a reschedule request' })
  async decideReschedule(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: unknown,
  ) {
    const params = parseRequest(DecideRescheduleSchema, body);
    const result = await this.rescheduleService.decideReschedule(
      principal,
      id,
      params.decision,
    );
    return {
      decision: result.decision,
      appointment: result.appointment
        ? toAppointmentResponse(result.appointment)
        : null,
      removed_id: result.removedId,
    };
  }
}
