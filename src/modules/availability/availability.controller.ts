import { Controller, Get, Param, ParseIntPipe, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { parseInput } from '../../common/validation/schedule.schemas.js';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard.js';
import { presentSlot } from '../slot/slot.presenter.js';
import { AvailabilityService } from './availability.service.js';
import { DoctorDayQuerySchema, SpecialtyQuerySchema } from './dto/search-slots.dto.js';

@ApiTags('Availability')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('availability')
export class AvailabilityController {
  constructor(private readonly availabilityService: AvailabilityService) {}

  @Get('doctors/:doctorId')
  @ApiOperation({ summary: "List a doctor's slots on one date" })
  @ApiQuery({ name: 'date', type: String, required: true, description: 'YYYY-MM-DD' })
  async searchDoctorDay(
    @Param('doctorId', ParseIntPipe) doctorId: number,
    @Query() query: unknown,
  ) {
    const { date } = parseInput(DoctorDayQuerySchema, query);
    const slots = await this.availabilityService.searchDoctorDay(doctorId, date);
    return { slots: slots.map(presentSlot) };
  }

  @Get('specialties/:specialtyId')
  @ApiOperation({ summary: 'List free slots across doctors of a specialty' })
  @ApiQuery({ name: 'from', type: String, required: false, description: 'YYYY-MM-DD, defaults to today' })
  async searchBySpecialty(
    @Param('specialtyId', ParseIntPipe) specialtyId: number,
    @Query() query: unknown,
  ) {
    const { from } = parseInput(SpecialtyQuerySchema, query);
    const slots = await this.availabilityService.searchBySpecialty(specialtyId, from);
    return { slots: slots.map(presentSlot) };
  }
}
