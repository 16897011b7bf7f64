import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock } from '../../common/clock.js';
import {
  InvalidSlotStateException,
  OwnershipForbiddenException,
  ResourceNotFoundException,
  SchedulingValidationException,
  SlotConflictException,
  SlotUnavailableException,
} from '../../common/errors/scheduling.exceptions.js';
import { addMinutesToTime, startInstant } from '../../common/time.js';
import type { SchedulingSettings } from '../../config/env.js';
import { isUniqueViolation } from '../../database/pg-errors.js';
import type { Caller } from '../auth/decorators/current-user.decorator.js';
import {
  SLOT_STORE,
  type SlotSession,
  type SlotStore,
} from '../slot-store/slot-store.js';
import type {
  Appointment,
  AppointmentState,
  DeliveryMode,
  Slot,
} from '../slot-store/slot-store.types.js';
import { authorizeAppointment } from './appointment.policy.js';
import type { BookAppointmentDto } from './dto/book-appointment.dto.js';
import type { UpdateAppointmentDto } from './dto/update-appointment.dto.js';

interface WallClockTarget {
  doctorId: number;
  date: string;
  time: string;
  deliveryMode: DeliveryMode;
}

const STATE_RANK: Record<AppointmentState, number> = {
  free: 0,
  confirmed: 1,
  cancelled: 2,
};

@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);

  constructor(
    @Inject(SLOT_STORE) private readonly store: SlotStore,
    private readonly config: ConfigService<SchedulingSettings, true>,
    private readonly clock: Clock,
  ) {}

  async book(caller: Caller, dto: BookAppointmentDto): Promise<Appointment> {
    const patientId = caller.patientId;
    if (patientId === null) {
      throw new OwnershipForbiddenException('Only patients can book appointments');
    }

    const idempotencyKey = dto.idempotency_key ?? null;
    if (idempotencyKey !== null) {
      const existing = await this.findByIdempotencyKey(caller.userId, idempotencyKey);
      if (existing) {
        return existing;
      }
    }

    try {
      const appointment = await this.store.transaction(async (session) => {
        const slot =
          'slot_id' in dto
            ? await this.loadBookableSlot(session, dto.slot_id)
            : await this.resolveWallClockSlot(
                session,
                {
                  doctorId: dto.doctor_id,
                  date: dto.appointment_date.date,
                  time: dto.appointment_date.time,
                  deliveryMode: dto.delivery_mode ?? 'physical',
                },
                caller.userId,
              );
        if (!slot) {
          throw new SlotUnavailableException('No free slot at the requested time');
        }
        this.assertNotStarted(slot, 'Cannot book a slot in the past', 'validation');

        const claimed = await session.claimSlot(slot.id);
        if (!claimed) {
          throw new SlotUnavailableException(`Slot ${slot.id} is no longer available`);
        }

        const created = await session.insertAppointment({
          slotId: claimed.id,
          doctorId: claimed.doctorId,
          patientId,
          institutionId: dto.institution_id ?? null,
          specialtyId: dto.specialty_id ?? null,
          urgency: dto.urgency,
          visitType: dto.visit_type,
          deliveryMode: dto.delivery_mode ?? claimed.deliveryMode,
          state: dto.state,
          createdBy: caller.userId,
          idempotencyKey,
        });
        await session.recordAudit([
          {
            slotId: claimed.id,
            action: 'booked',
            changes: { appointmentId: created.id },
            performedBy: caller.userId,
          },
        ]);
        return created;
      });

      this.logger.log(
        `Booked appointment ${appointment.id} on slot ${appointment.slotId} for patient ${patientId}`,
      );
      return appointment;
    } catch (error: unknown) {
      if (idempotencyKey !== null && isUniqueViolation(error, 'idempotency')) {
        const existing = await this.findByIdempotencyKey(caller.userId, idempotencyKey);
        if (existing) {
          return existing;
        }
      }
      if (error instanceof SlotConflictException) {
        // A concurrent writer took the synthesized slot's interval
        this.logger.warn(`Lost booking race for doctor slot: ${error.message}`);
        throw new SlotUnavailableException('No free slot at the requested time');
      }
      if (error instanceof SlotUnavailableException) {
        this.logger.warn(`Booking rejected: ${error.message}`);
      }
      throw error;
    }
  }

  async update(
    caller: Caller,
    appointmentId: number,
    dto: UpdateAppointmentDto,
  ): Promise<Appointment> {
    const updated = await this.store
      .transaction(async (session) => {
        const appointment = await session.findAppointment(appointmentId, { lock: true });
        if (!appointment) {
          throw new ResourceNotFoundException('Appointment', appointmentId);
        }
        if (authorizeAppointment('update', caller, appointment) === 'deny') {
          throw new OwnershipForbiddenException();
        }
        if (appointment.state === 'cancelled') {
          throw new InvalidSlotStateException(
            `Appointment ${appointmentId} is cancelled`,
          );
        }

        let current = appointment;
        if (dto.appointment_date) {
          current = await this.retarget(session, current, dto.appointment_date, caller);
        }
        if (dto.state && dto.state !== current.state) {
          current = await this.transition(session, current, dto.state, caller);
        }
        return current;
      })
      .catch((error: unknown) => {
        // A target slot held by a concurrent booker is a conflict for moves
        if (error instanceof SlotUnavailableException) {
          throw new SlotConflictException(error.message);
        }
        throw error;
      });

    this.logger.log(`Updated appointment ${updated.id} (state ${updated.state})`);
    return updated;
  }

  /** Cancels the caller's appointment and releases its slot. */
  async remove(caller: Caller, appointmentId: number): Promise<Appointment> {
    const cancelled = await this.store.transaction(async (session) => {
      const appointment = await session.findAppointment(appointmentId, { lock: true });
      if (!appointment) {
        throw new ResourceNotFoundException('Appointment', appointmentId);
      }
      if (authorizeAppointment('delete', caller, appointment) === 'deny') {
        throw new OwnershipForbiddenException(
          'Only the creator may delete this appointment',
        );
      }
      if (appointment.state === 'cancelled') {
        throw new ResourceNotFoundException('Appointment', appointmentId);
      }
      return this.cancelAndRelease(session, appointment, caller);
    });

    this.logger.log(`Deleted appointment ${cancelled.id}; slot ${cancelled.slotId} released`);
    return cancelled;
  }

  async findOne(caller: Caller, appointmentId: number): Promise<Appointment> {
    const appointment = await this.store.read((session) =>
      session.findAppointment(appointmentId),
    );
    if (!appointment) {
      throw new ResourceNotFoundException('Appointment', appointmentId);
    }
    if (authorizeAppointment('read', caller, appointment) === 'deny') {
      throw new OwnershipForbiddenException();
    }
    return appointment;
  }

  /** Doctors see appointments on their slots, everyone else what they created. */
  async findMine(caller: Caller): Promise<Appointment[]> {
    const filters =
      caller.role === 'doctor' && caller.doctorId !== null
        ? { doctorId: caller.doctorId }
        : { createdBy: caller.userId };
    return this.store.read((session) => session.listAppointments(filters));
  }

  private async findByIdempotencyKey(
    createdBy: number,
    key: string,
  ): Promise<Appointment | null> {
    return this.store.read((session) =>
      session.findAppointmentByIdempotencyKey(createdBy, key),
    );
  }

  private async loadBookableSlot(session: SlotSession, slotId: number): Promise<Slot> {
    const slot = await session.findSlot(slotId);
    if (!slot) {
      throw new ResourceNotFoundException('Slot', slotId);
    }
    if (slot.state !== 'free') {
      throw new SlotUnavailableException(`Slot ${slotId} is ${slot.state}`);
    }
    return slot;
  }

  /**
   * Free slot of the doctor starting exactly at the target time. When none
   * exists and the default-length interval is clear, one is created.
   * Returns null when the time is taken.
   */
  private async resolveWallClockSlot(
    session: SlotSession,
    target: WallClockTarget,
    performedBy: number,
  ): Promise<Slot | null> {
    const existing = await session.findFreeSlotAt(
      target.doctorId,
      target.date,
      target.time,
    );
    if (existing) {
      return existing;
    }

    const durationMinutes = this.config.get('DEFAULT_SLOT_MINUTES', { infer: true });
    const endTime = addMinutesToTime(target.time, durationMinutes);
    if (endTime === null) {
      throw new SchedulingValidationException(
        'Requested time leaves no room for a slot before midnight',
      );
    }
    const overlapping = await session.findOverlappingSlots(
      target.doctorId,
      target.date,
      target.time,
      endTime,
    );
    if (overlapping.length > 0) {
      return null;
    }

    const [created] = await session.insertSlots([
      {
        doctorId: target.doctorId,
        date: target.date,
        startTime: target.time,
        endTime,
        durationMinutes,
        deliveryMode: target.deliveryMode,
      },
    ]);
    await session.recordAudit([
      {
        slotId: created.id,
        action: 'generated',
        changes: { source: 'booking' },
        performedBy,
      },
    ]);
    return created;
  }

  private async retarget(
    session: SlotSession,
    appointment: Appointment,
    target: { date: string; time: string },
    caller: Caller,
  ): Promise<Appointment> {
    const current = await this.requireSlot(session, appointment.slotId);
    this.assertNotStarted(current, 'Cannot move an appointment whose slot has started');
    if (current.date === target.date && current.startTime === target.time) {
      return appointment;
    }
    if (startInstant(target.date, target.time) < this.clock.now()) {
      throw new SchedulingValidationException('Cannot move an appointment into the past');
    }

    await session.releaseSlot(current.id);
    const next = await this.resolveWallClockSlot(
      session,
      {
        doctorId: appointment.doctorId,
        date: target.date,
        time: target.time,
        deliveryMode: appointment.deliveryMode,
      },
      caller.userId,
    );
    const claimed = next ? await session.claimSlot(next.id) : null;
    if (!claimed) {
      throw new SlotConflictException(
        `Doctor ${appointment.doctorId} has no free slot at ${target.date} ${target.time}`,
      );
    }

    const moved = await session.updateAppointment(appointment.id, { slotId: claimed.id });
    await session.recordAudit([
      {
        slotId: current.id,
        action: 'released',
        changes: { appointmentId: appointment.id, movedTo: claimed.id },
        performedBy: caller.userId,
      },
      {
        slotId: claimed.id,
        action: 'booked',
        changes: { appointmentId: appointment.id, movedFrom: current.id },
        performedBy: caller.userId,
      },
    ]);
    return moved;
  }

  private async transition(
    session: SlotSession,
    appointment: Appointment,
    state: AppointmentState,
    caller: Caller,
  ): Promise<Appointment> {
    if (STATE_RANK[state] < STATE_RANK[appointment.state]) {
      throw new InvalidSlotStateException(
        `Appointment cannot move from ${appointment.state} back to ${state}`,
      );
    }
    if (state === 'cancelled') {
      return this.cancelAndRelease(session, appointment, caller);
    }
    return session.updateAppointment(appointment.id, { state });
  }

  private async cancelAndRelease(
    session: SlotSession,
    appointment: Appointment,
    caller: Caller,
  ): Promise<Appointment> {
    const slot = await this.requireSlot(session, appointment.slotId);
    this.assertNotStarted(slot, 'Cannot cancel an appointment whose slot has started');

    const cancelled = await session.updateAppointment(appointment.id, {
      state: 'cancelled',
    });
    if (await session.releaseSlot(slot.id)) {
      await session.recordAudit([
        {
          slotId: slot.id,
          action: 'released',
          changes: { appointmentId: appointment.id },
          performedBy: caller.userId,
        },
      ]);
    }
    return cancelled;
  }

  private async requireSlot(session: SlotSession, slotId: number): Promise<Slot> {
    const slot = await session.findSlot(slotId, { lock: true });
    if (!slot) {
      throw new ResourceNotFoundException('Slot', slotId);
    }
    return slot;
  }

  private assertNotStarted(
    slot: Slot,
    message: string,
    kind: 'state' | 'validation' = 'state',
  ): void {
    if (startInstant(slot.date, slot.startTime) >= this.clock.now()) {
      return;
    }
    throw kind === 'validation'
      ? new SchedulingValidationException(message)
      : new InvalidSlotStateException(message);
  }
}
