import { Module } from '@nestjs/common';
import { AvailabilityModule } from '../availability/availability.module.js';
import { SlotStoreModule } from '../slot-store/slot-store.module.js';
import { SlotModificationService } from './slot-modification.service.js';
import { SlotController } from './slot.controller.js';
import { SlotService } from './slot.service.js';

@Module({
  imports: [SlotStoreModule, AvailabilityModule],
  controllers: [SlotController],
  providers: [SlotService, SlotModificationService],
  exports: [SlotService, SlotModificationService],
})
export class SlotModule {}
