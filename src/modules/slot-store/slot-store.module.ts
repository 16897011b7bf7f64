import { Module } from '@nestjs/common';
import { DrizzleSlotStore } from './drizzle-slot.store.js';
import { SLOT_STORE } from './slot-store.js';

@Module({
  providers: [{ provide: SLOT_STORE, useClass: DrizzleSlotStore }],
  exports: [SLOT_STORE],
})
export class SlotStoreModule {}
