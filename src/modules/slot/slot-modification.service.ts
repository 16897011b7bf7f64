import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock } from '../../common/clock.js';
import {
  InvalidSlotStateException,
  ResourceNotFoundException,
  SchedulingValidationException,
  SlotConflictException,
} from '../../common/errors/scheduling.exceptions.js';
import { addMinutesToTime, startInstant } from '../../common/time.js';
import type { SchedulingSettings } from '../../config/env.js';
import {
  SLOT_STORE,
  type SlotSession,
  type SlotStore,
} from '../slot-store/slot-store.js';
import type { DeliveryMode, Slot } from '../slot-store/slot-store.types.js';
import {
  assertGenerationWindow,
  expandSlotCandidates,
  partitionCandidates,
  type GenerationWindow,
} from './slot-generator.js';

export type CancelScope = { doctorId: number } | 'all';

export interface RescheduleResult {
  movedCount: number;
  unmovedSlotIds: number[];
}

/**
 * Shift, cancel, convert and day-level reschedule of existing slots. Each
 * operation runs in one transaction with the touched rows locked, and keeps
 * slot ids stable so bound appointments follow their slot.
 */
@Injectable()
export class SlotModificationService {
  private readonly logger = new Logger(SlotModificationService.name);

  constructor(
    @Inject(SLOT_STORE) private readonly store: SlotStore,
    private readonly config: ConfigService<SchedulingSettings, true>,
    private readonly clock: Clock,
  ) {}

  /** Loads a slot for modification, optionally restricted to one doctor. */
  async findOwnedSlot(slotId: number, doctorId: number | null): Promise<Slot> {
    const slot = await this.store.read((session) => session.findSlot(slotId));
    if (!slot || (doctorId !== null && slot.doctorId !== doctorId)) {
      throw new ResourceNotFoundException('Slot', slotId);
    }
    return slot;
  }

  async shift(
    slotId: number,
    target: { date: string; time: string },
    performedBy: number | null,
  ): Promise<Slot> {
    return this.store.transaction(async (session) => {
      const slot = await this.lockModifiable(session, slotId);

      const endTime = addMinutesToTime(target.time, slot.durationMinutes);
      if (endTime === null) {
        throw new SchedulingValidationException(
          'Shifted slot would cross midnight',
        );
      }
      if (startInstant(target.date, target.time) < this.clock.now()) {
        throw new SchedulingValidationException('Cannot shift a slot into the past');
      }
      if (slot.date === target.date && slot.startTime === target.time) {
        return slot;
      }

      const overlapping = await session.findOverlappingSlots(
        slot.doctorId,
        target.date,
        target.time,
        endTime,
        slot.id,
      );
      if (overlapping.length > 0) {
        this.logger.warn(
          `Shift of slot ${slot.id} to ${target.date} ${target.time} overlaps slot ${overlapping[0].id}`,
        );
        throw new SlotConflictException(
          `Slot ${slot.id} would overlap slot ${overlapping[0].id}`,
        );
      }

      const updated = await session.updateSlotSchedule(slot.id, {
        date: target.date,
        startTime: target.time,
        endTime,
        durationMinutes: slot.durationMinutes,
      });
      await session.recordAudit([
        {
          slotId: slot.id,
          action: 'shifted',
          changes: {
            from: { date: slot.date, startTime: slot.startTime },
            to: { date: updated.date, startTime: updated.startTime },
          },
          performedBy,
        },
      ]);
      this.logger.log(
        `Shifted slot ${slot.id} from ${slot.date} ${slot.startTime} to ${updated.date} ${updated.startTime}`,
      );
      return updated;
    });
  }

  /**
   * Cancels every listed slot not cancelled yet, cascading to their
   * appointments. With `doctorId` set, slots of other doctors are ignored
   * like unknown ids.
   */
  async cancel(
    slotIds: number[],
    doctorId: number | null,
    performedBy: number | null,
  ): Promise<number> {
    const count = await this.store.transaction(async (session) => {
      const locked = await session.lockSlots([...new Set(slotIds)]);
      const owned = locked
        .filter((slot) => doctorId === null || slot.doctorId === doctorId)
        .map((slot) => slot.id);
      return this.cancelWithCascade(session, owned, performedBy);
    });
    this.logger.log(`Cancelled ${count} of ${slotIds.length} requested slots`);
    return count;
  }

  async cancelByDate(
    date: string,
    scope: CancelScope,
    performedBy: number | null,
  ): Promise<number> {
    const doctorId = scope === 'all' ? null : scope.doctorId;
    const count = await this.store.transaction(async (session) => {
      const live = await session.findLiveSlotsOnDate(date, doctorId);
      const locked = await session.lockSlots(live.map((slot) => slot.id));
      return this.cancelWithCascade(
        session,
        locked.map((slot) => slot.id),
        performedBy,
      );
    });
    this.logger.log(
      `Cancelled ${count} slots on ${date} for ${doctorId === null ? 'all doctors' : `doctor ${doctorId}`}`,
    );
    return count;
  }

  async convertDeliveryMode(
    slotId: number,
    mode: DeliveryMode,
    performedBy: number | null,
  ): Promise<Slot> {
    return this.store.transaction(async (session) => {
      const slot = await this.lockModifiable(session, slotId);
      if (slot.deliveryMode === mode) {
        return slot;
      }

      const updated = await session.updateSlotDeliveryMode(slot.id, mode);
      const appointment = await session.findLiveAppointmentBySlot(slot.id);
      if (appointment) {
        await session.updateAppointment(appointment.id, { deliveryMode: mode });
      }
      await session.recordAudit([
        {
          slotId: slot.id,
          action: 'converted',
          changes: { from: slot.deliveryMode, to: mode },
          performedBy,
        },
      ]);
      this.logger.log(`Converted slot ${slot.id} to ${mode}`);
      return updated;
    });
  }

  /**
   * Moves the live slots of `sourceDate`, in start order, onto the free
   * targets of a freshly expanded window. Sources that already started or
   * that find no target stay where they are.
   */
  async rescheduleByDate(
    doctorId: number,
    sourceDate: string,
    window: GenerationWindow,
    performedBy: number | null,
  ): Promise<RescheduleResult> {
    const now = this.clock.now();
    assertGenerationWindow(window, {
      now,
      maxDays: this.config.get('SLOT_GENERATION_MAX_DAYS', { infer: true }),
    });
    const candidates = expandSlotCandidates(window);

    const result = await this.store.transaction(async (session) => {
      await session.lockDoctor(doctorId);
      const onSourceDate = await session.findLiveSlotsOnDate(sourceDate, doctorId);
      const locked = await session.lockSlots(onSourceDate.map((slot) => slot.id));
      const sources = locked
        .filter((slot) => slot.state !== 'cancelled' && slot.date === sourceDate)
        .sort((a, b) => a.startTime.localeCompare(b.startTime));
      const occupied = await session.findLiveSlotsInRange(
        doctorId,
        window.startDate,
        window.endDate,
      );
      const { free: targets } = partitionCandidates(candidates, occupied);

      const movable = sources.filter(
        (slot) => startInstant(slot.date, slot.startTime) >= now,
      );
      const unmovedSlotIds = sources
        .filter((slot) => !movable.includes(slot))
        .map((slot) => slot.id);

      let movedCount = 0;
      for (const [index, slot] of movable.entries()) {
        const target = targets.at(index);
        if (!target) {
          unmovedSlotIds.push(slot.id);
          continue;
        }
        await session.updateSlotSchedule(slot.id, {
          ...target,
          durationMinutes: window.durationMinutes,
        });
        await session.recordAudit([
          {
            slotId: slot.id,
            action: 'rescheduled',
            changes: {
              from: { date: slot.date, startTime: slot.startTime },
              to: { date: target.date, startTime: target.startTime },
            },
            performedBy,
          },
        ]);
        movedCount += 1;
      }
      return { movedCount, unmovedSlotIds };
    });

    this.logger.log(
      `Rescheduled ${result.movedCount} slots of doctor ${doctorId} from ${sourceDate}; ` +
        `${result.unmovedSlotIds.length} left in place`,
    );
    return result;
  }

  private async lockModifiable(session: SlotSession, slotId: number): Promise<Slot> {
    const slot = await session.findSlot(slotId, { lock: true });
    if (!slot) {
      throw new ResourceNotFoundException('Slot', slotId);
    }
    if (slot.state === 'cancelled') {
      throw new InvalidSlotStateException(`Slot ${slotId} is cancelled`);
    }
    if (startInstant(slot.date, slot.startTime) < this.clock.now()) {
      throw new InvalidSlotStateException(`Slot ${slotId} has already started`);
    }
    return slot;
  }

  private async cancelWithCascade(
    session: SlotSession,
    slotIds: number[],
    performedBy: number | null,
  ): Promise<number> {
    const cancelled = await session.cancelSlots(slotIds);
    const ids = cancelled.map((slot) => slot.id);
    const appointments = await session.cancelAppointmentsForSlots(ids);
    await session.recordAudit(
      cancelled.map((slot) => ({
        slotId: slot.id,
        action: 'cancelled' as const,
        changes: {
          appointmentIds: appointments
            .filter((appointment) => appointment.slotId === slot.id)
            .map((appointment) => appointment.id),
        },
        performedBy,
      })),
    );
    return cancelled.length;
  }
}
