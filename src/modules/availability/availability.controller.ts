import {
  Body,
  Controller,
  Delete,
  Get,
  Put,
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
import { RequestTimezone } from '../../common/decorators/request-timezone.decorator.js';
import { TIMEZONE_HEADER } from '../../common/middleware/timezone.middleware.js';
import { parseRequest } from '../../common/validation/parse-request.js';
import type { AvailabilityWindowRow } from '../../database/schema/index.js';
import { CurrentUser } from '../auth/decorators/current-user.decorator.js';
import { JwtAuthGuard } from '../auth/jwt-auth.guard.js';
import type { Principal } from '../auth/principal.js';
import { AvailabilityService } from './availability.service.js';
import { DeleteSlotSchema } from './dto/delete-slot.dto.js';
import { ListSlotsSchema } from './dto/list-slots.dto.js';
import { ListWindowsSchema } from './dto/list-windows.dto.js';
import { UpsertWindowSchema } from './dto/upsert-window.dto.js';

function toWindowResponse(window: AvailabilityWindowRow) {
  return {
    id: window.id,
    doctor_id: window.doctorId,
    date: window.date,
    start_time: window.startTime,
    end_time: window.endTime,
  };
}

@ApiTags('Availability')
@ApiBearerAuth()
@ApiHeader({ name: TIMEZONE_HEADER, required: false, description: 'IANA timezone' })
@UseGuards(JwtAuthGuard)
@Controller('availability')
export class AvailabilityController {
  constructor(private readonly availabilityService: AvailabilityService) {}

  @Get('slots')
  @ApiOperation({ summary: 'List bookable 30-minute slots of a doctor on a date' })
  @ApiQuery({ name: 'doctor_id', type: String, required: true })
  @ApiQuery({ name: 'date', type: String, required: true, description: 'YYYY-MM-DD' })
  async listSlots(
    @Query() query: unknown,
    @RequestTimezone() timezone: string,
  ) {
    const params = parseRequest(ListSlotsSchema, query);
    const slots = await this.availabilityService.listSlots(
      params.doctor_id,
      params.date,
      timezone,
    );

    return {
      doctor_id: params.doctor_id,
      date: params.date,
      timezone,
      slots: slots.map((slot) => ({
        start: slot.start.toISOString(),
        end: slot.end.toISOString(),
      })),
    };
  }

  @Delete('slots')
  @ApiOperation({ summary: 'Remove one slot from the window that offers it' })
  @ApiQuery({ name: 'doctor_id', type: String, required: false })
  @ApiQuery({ name: 'slot_start', type: String, required: true, description: 'YYYY-MM-DDTHH:mm' })
  async deleteSlot(
    @CurrentUser() principal: Principal,
    @Query() query: unknown,
    @RequestTimezone() timezone: string,
  ) {
    const params = parseRequest(DeleteSlotSchema, query);
    const result = await this.availabilityService.deleteSlot(
      principal,
      params.doctor_id,
      params.slot_start,
      timezone,
    );

    return {
      slot: {
        start: result.slot.start.toISOString(),
        end: result.slot.end.toISOString(),
      },
      change: result.change,
    };
  }

  @Get('windows')
  @ApiOperation({ summary: 'List availability windows' })
  @ApiQuery({ name: 'doctor_id', type: String, required: false })
  @ApiQuery({ name: 'from', type: String, required: false })
  @ApiQuery({ name: 'to', type: String, required: false })
  async listWindows(
    @CurrentUser() principal: Principal,
    @Query() query: unknown,
  ) {
    const params = parseRequest(ListWindowsSchema, query);
    const windows = await this.availabilityService.listWindows(principal, {
      doctorId: params.doctor_id,
      from: params.from,
      to: params.to,
    });
    return { windows: windows.map(toWindowResponse) };
  }

  @Put('windows')
  @ApiOperation({ summary: "Replace a doctor's availability on one date" })
  async upsertWindow(
    @CurrentUser() principal: Principal,
    @Body() body: unknown,
  ) {
    const params = parseRequest(UpsertWindowSchema, body);
    const result = await this.availabilityService.upsertWindow(principal, {
      doctorId: params.doctor_id,
      date: params.date,
      startTime: params.start_time,
      endTime: params.end_time,
    });

    return {
      window: toWindowResponse(result.window),
      created: result.created,
    };
  }
}
