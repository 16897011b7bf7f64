import { Test, TestingModule } from '@nestjs/testing';
import { Clock } from '../../common/clock.js';
import { SLOT_STORE } from '../slot-store/slot-store.js';
import { AvailabilityService } from './availability.service.js';
import { FixedClock } from '../../../test/support/fixed-clock.js';
import { InMemorySlotStore } from '../../../test/support/in-memory-slot-store.js';

describe('AvailabilityService', () => {
  let service: AvailabilityService;
  let store: InMemorySlotStore;

  beforeEach(async () => {
    store = new InMemorySlotStore();
    store.seedSlot({ id: 1, doctorId: 12, date: '2025-04-11', startTime: '11:00', endTime: '11:20' });
    store.seedSlot({ id: 2, doctorId: 12, date: '2025-04-11', startTime: '10:00', endTime: '10:20', state: 'booked' });
    store.seedSlot({ id: 3, doctorId: 12, date: '2025-04-11', startTime: '10:20', endTime: '10:40', state: 'cancelled' });
    store.seedSlot({ id: 4, doctorId: 12, date: '2025-04-12', startTime: '09:00', endTime: '09:20', deliveryMode: 'telemedicine' });
    store.seedSlot({ id: 5, doctorId: 13, date: '2025-04-11', startTime: '11:00', endTime: '11:30' });
    store.seedSlot({ id: 6, doctorId: 13, date: '2025-04-09', startTime: '08:00', endTime: '08:30' });
    store.seedSlot({ id: 7, doctorId: 14, date: '2025-04-11', startTime: '08:00', endTime: '08:30' });
    store.doctorSpecialties.push(
      { doctorId: 12, specialtyId: 5 },
      { doctorId: 13, specialtyId: 5 },
      { doctorId: 14, specialtyId: 6 },
    );

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AvailabilityService,
        { provide: SLOT_STORE, useValue: store },
        { provide: Clock, useValue: new FixedClock(new Date(2025, 3, 10, 8, 0)) },
      ],
    }).compile();

    service = module.get<AvailabilityService>(AvailabilityService);
  });

  describe('searchDoctorDay', () => {
    it('returns every slot of the day in start order with its state', async () => {
      const slots = await service.searchDoctorDay(12, '2025-04-11');

      expect(slots.map((slot) => [slot.id, slot.startTime, slot.state])).toEqual([
        [2, '10:00', 'booked'],
        [3, '10:20', 'cancelled'],
        [1, '11:00', 'free'],
      ]);
    });

    it('returns nothing for a day without slots', async () => {
      await expect(service.searchDoctorDay(12, '2025-05-01')).resolves.toEqual([]);
    });
  });

  describe('searchBySpecialty', () => {
    it('returns free slots of linked doctors from today by date, time and doctor', async () => {
      const slots = await service.searchBySpecialty(5);

      expect(slots.map((slot) => [slot.id, slot.doctorId])).toEqual([
        [1, 12],
        [5, 13],
        [4, 12],
      ]);
    });

    it('honours an explicit start date', async () => {
      const slots = await service.searchBySpecialty(5, '2025-04-12');

      expect(slots.map((slot) => slot.id)).toEqual([4]);
    });

    it('leaves out doctors who are no longer active', async () => {
      store.inactiveDoctors.add(13);

      const slots = await service.searchBySpecialty(5);

      expect(slots.map((slot) => slot.id)).toEqual([1, 4]);
    });
  });

  describe('listDoctorSlots', () => {
    it('applies state, delivery mode and date filters', async () => {
      expect((await service.listDoctorSlots(12, {})).map((slot) => slot.id)).toEqual([2, 3, 1, 4]);
      expect((await service.listDoctorSlots(12, { state: 'free' })).map((slot) => slot.id)).toEqual([1, 4]);
      expect(
        (await service.listDoctorSlots(12, { deliveryMode: 'telemedicine' })).map((slot) => slot.id),
      ).toEqual([4]);
      expect(
        (await service.listDoctorSlots(12, { date: '2025-04-11', state: 'booked' })).map((slot) => slot.id),
      ).toEqual([2]);
    });
  });

  it('reads committed state on every call', async () => {
    await store.transaction((session) => session.claimSlot(1));

    const slots = await service.searchBySpecialty(5);

    expect(slots.map((slot) => slot.id)).toEqual([5, 4]);
  });
});
