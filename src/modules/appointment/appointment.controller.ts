import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { parseInput } from '../../common/validation/schedule.schemas.js';
import { CurrentUser, type Caller } from '../auth/decorators/current-user.decorator.js';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard.js';
import { presentAppointment } from './appointment.presenter.js';
import { AppointmentService } from './appointment.service.js';
import { BookAppointmentSchema } from './dto/book-appointment.dto.js';
import { UpdateAppointmentSchema } from './dto/update-appointment.dto.js';

@ApiTags('Appointments')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('appointments')
export class AppointmentController {
  constructor(private readonly appointmentService: AppointmentService) {}

  @Post()
  @ApiOperation({ summary: 'Book a slot by id, or a doctor at a date and time' })
  async book(@CurrentUser() caller: Caller, @Body() body: unknown) {
    const dto = parseInput(BookAppointmentSchema, body);
    const appointment = await this.appointmentService.book(caller, dto);
    return presentAppointment(appointment);
  }

  @Get()
  @ApiOperation({ summary: "List the caller's appointments" })
  async findMine(@CurrentUser() caller: Caller) {
    const appointments = await this.appointmentService.findMine(caller);
    return { appointments: appointments.map(presentAppointment) };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get appointment by ID' })
  async findOne(
    @CurrentUser() caller: Caller,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return presentAppointment(await this.appointmentService.findOne(caller, id));
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Move an appointment or advance its state' })
  async update(
    @CurrentUser() caller: Caller,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ) {
    const dto = parseInput(UpdateAppointmentSchema, body);
    return presentAppointment(await this.appointmentService.update(caller, id, dto));
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Cancel an appointment and release its slot' })
  async remove(
    @CurrentUser() caller: Caller,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return presentAppointment(await this.appointmentService.remove(caller, id));
  }
}
