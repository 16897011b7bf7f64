import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { parseInput } from '../../common/validation/schedule.schemas.js';
import { CurrentUser, type Caller } from '../auth/decorators/current-user.decorator.js';
import { Roles } from '../auth/decorators/roles.decorator.js';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard.js';
import { RolesGuard } from '../auth/guards/roles.guard.js';
import { AvailabilityService } from '../availability/availability.service.js';
import { ownedDoctorScope, resolveActingDoctor } from './acting-doctor.js';
import {
  CancelSlotsByDateSchema,
  CancelSlotsSchema,
} from './dto/cancel-slots.dto.js';
import { ConvertDeliveryModeSchema } from './dto/convert-delivery-mode.dto.js';
import { GenerateSlotsSchema } from './dto/generate-slots.dto.js';
import { ListSlotsQuerySchema } from './dto/list-slots.dto.js';
import { RescheduleSlotsByDateSchema } from './dto/reschedule-slots.dto.js';
import { ShiftSlotSchema } from './dto/shift-slot.dto.js';
import { SlotModificationService, type CancelScope } from './slot-modification.service.js';
import { presentSlot } from './slot.presenter.js';
import { SlotService } from './slot.service.js';

@ApiTags('Slots')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles('doctor', 'admin')
@Controller('slots')
export class SlotController {
  constructor(
    private readonly slotService: SlotService,
    private readonly modificationService: SlotModificationService,
    private readonly availabilityService: AvailabilityService,
  ) {}

  @Post('generate')
  @ApiOperation({ summary: 'Generate slots over a date and time window' })
  async generate(@CurrentUser() caller: Caller, @Body() body: unknown) {
    const dto = parseInput(GenerateSlotsSchema, body);
    const result = await this.slotService.generate(
      {
        doctorId: resolveActingDoctor(caller, dto.doctor_id),
        deliveryMode: dto.delivery_mode,
        startDate: dto.start_date,
        endDate: dto.end_date,
        startTime: dto.start_time,
        endTime: dto.end_time,
        durationMinutes: dto.duration_minutes,
      },
      caller.userId,
    );
    return {
      created_count: result.createdCount,
      skipped_count: result.skippedCount,
    };
  }

  @Get()
  @ApiOperation({ summary: "List a doctor's slots with optional filters" })
  async list(@CurrentUser() caller: Caller, @Query() query: unknown) {
    const dto = parseInput(ListSlotsQuerySchema, query);
    const slots = await this.availabilityService.listDoctorSlots(
      resolveActingDoctor(caller, dto.doctor_id),
      { date: dto.date, state: dto.state, deliveryMode: dto.delivery_mode },
    );
    return { slots: slots.map(presentSlot) };
  }

  @Patch(':id/schedule')
  @ApiOperation({ summary: 'Move a slot to another date and start time' })
  async shift(
    @CurrentUser() caller: Caller,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ) {
    const dto = parseInput(ShiftSlotSchema, body);
    await this.modificationService.findOwnedSlot(id, ownedDoctorScope(caller));
    const slot = await this.modificationService.shift(id, dto, caller.userId);
    return presentSlot(slot);
  }

  @Patch(':id/delivery-mode')
  @ApiOperation({ summary: 'Switch a slot between physical and telemedicine' })
  async convert(
    @CurrentUser() caller: Caller,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ) {
    const dto = parseInput(ConvertDeliveryModeSchema, body);
    await this.modificationService.findOwnedSlot(id, ownedDoctorScope(caller));
    const slot = await this.modificationService.convertDeliveryMode(
      id,
      dto.delivery_mode,
      caller.userId,
    );
    return presentSlot(slot);
  }

  @Post('cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel slots by id' })
  async cancel(@CurrentUser() caller: Caller, @Body() body: unknown) {
    const dto = parseInput(CancelSlotsSchema, body);
    const cancelled = await this.modificationService.cancel(
      dto.slot_ids,
      ownedDoctorScope(caller),
      caller.userId,
    );
    return { cancelled_count: cancelled };
  }

  @Post('cancel-by-date')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel every slot of a date' })
  async cancelByDate(@CurrentUser() caller: Caller, @Body() body: unknown) {
    const dto = parseInput(CancelSlotsByDateSchema, body);
    const scope: CancelScope =
      caller.role === 'admin' && dto.doctor_id === 'all'
        ? 'all'
        : {
            doctorId: resolveActingDoctor(
              caller,
              dto.doctor_id === 'all' ? undefined : dto.doctor_id,
            ),
          };
    const cancelled = await this.modificationService.cancelByDate(
      dto.date,
      scope,
      caller.userId,
    );
    return { cancelled_count: cancelled };
  }

  @Post('reschedule-by-date')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Move a day's slots onto a new generated grid" })
  async rescheduleByDate(@CurrentUser() caller: Caller, @Body() body: unknown) {
    const dto = parseInput(RescheduleSlotsByDateSchema, body);
    const result = await this.modificationService.rescheduleByDate(
      resolveActingDoctor(caller, dto.doctor_id),
      dto.source_date,
      {
        startDate: dto.start_date,
        endDate: dto.end_date,
        startTime: dto.start_time,
        endTime: dto.end_time,
        durationMinutes: dto.duration_minutes,
      },
      caller.userId,
    );
    return {
      moved_count: result.movedCount,
      unmoved_slot_ids: result.unmovedSlotIds,
    };
  }
}
