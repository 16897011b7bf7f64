import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock } from '../../common/clock.js';
import type { SchedulingSettings } from '../../config/env.js';
import { SLOT_STORE, type SlotStore } from '../slot-store/slot-store.js';
import type { DeliveryMode } from '../slot-store/slot-store.types.js';
import {
  assertGenerationWindow,
  expandSlotCandidates,
  partitionCandidates,
  type GenerationWindow,
} from './slot-generator.js';

export interface GenerateSlotsCommand extends GenerationWindow {
  doctorId: number;
  deliveryMode: DeliveryMode;
}

export interface GenerateSlotsResult {
  createdCount: number;
  skippedCount: number;
}

@Injectable()
export class SlotService {
  private readonly logger = new Logger(SlotService.name);

  constructor(
    @Inject(SLOT_STORE) private readonly store: SlotStore,
    private readonly config: ConfigService<SchedulingSettings, true>,
    private readonly clock: Clock,
  ) {}

  async generate(
    command: GenerateSlotsCommand,
    performedBy: number | null,
  ): Promise<GenerateSlotsResult> {
    assertGenerationWindow(command, {
      now: this.clock.now(),
      maxDays: this.config.get('SLOT_GENERATION_MAX_DAYS', { infer: true }),
    });

    const candidates = expandSlotCandidates(command);

    const created = await this.store.transaction(async (session) => {
      await session.lockDoctor(command.doctorId);
      const existing = await session.findLiveSlotsInRange(
        command.doctorId,
        command.startDate,
        command.endDate,
      );
      const { free } = partitionCandidates(candidates, existing);
      const inserted = await session.insertSlots(
        free.map((candidate) => ({
          ...candidate,
          doctorId: command.doctorId,
          durationMinutes: command.durationMinutes,
          deliveryMode: command.deliveryMode,
        })),
      );
      await session.recordAudit(
        inserted.map((slot) => ({
          slotId: slot.id,
          action: 'generated' as const,
          performedBy,
        })),
      );
      return inserted.length;
    });

    const result = {
      createdCount: created,
      skippedCount: candidates.length - created,
    };
    this.logger.log(
      `Generated ${result.createdCount} slots for doctor ${command.doctorId} ` +
        `(${result.skippedCount} skipped) between ${command.startDate} and ${command.endDate}`,
    );
    return result;
  }
}
