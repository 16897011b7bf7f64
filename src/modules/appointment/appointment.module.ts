import { Module } from '@nestjs/common';
import { SlotStoreModule } from '../slot-store/slot-store.module.js';
import { AppointmentController } from './appointment.controller.js';
import { AppointmentService } from './appointment.service.js';

@Module({
  imports: [SlotStoreModule],
  controllers: [AppointmentController],
  providers: [AppointmentService],
  exports: [AppointmentService],
})
export class AppointmentModule {}
