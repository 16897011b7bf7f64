import type { Slot } from '../slot-store/slot-store.types.js';

export interface SlotView {
  id: number;
  doctor_id: number;
  date: string;
  start_time: string;
  end_time: string;
  duration_minutes: number;
  delivery_mode: Slot['deliveryMode'];
  state: Slot['state'];
}

export function presentSlot(slot: Slot): SlotView {
  return {
    id: slot.id,
    doctor_id: slot.doctorId,
    date: slot.date,
    start_time: slot.startTime,
    end_time: slot.endTime,
    duration_minutes: slot.durationMinutes,
    delivery_mode: slot.deliveryMode,
    state: slot.state,
  };
}
