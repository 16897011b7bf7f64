import {
  CanActivate,
  ExecutionContext,
  HttpStatus,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppController } from '../src/app.controller.js';
import { Clock } from '../src/common/clock.js';
import { CommonModule } from '../src/common/common.module.js';
import { SchedulingExceptionFilter } from '../src/common/filters/scheduling-exception.filter.js';
import { AppointmentModule } from '../src/modules/appointment/appointment.module.js';
import type { Caller } from '../src/modules/auth/decorators/current-user.decorator.js';
import { JwtAuthGuard } from '../src/modules/auth/guards/jwt-auth.guard.js';
import { AvailabilityModule } from '../src/modules/availability/availability.module.js';
import { SLOT_STORE } from '../src/modules/slot-store/slot-store.js';
import { SlotModule } from '../src/modules/slot/slot.module.js';
import { admin, doctor, patient } from './support/callers.js';
import { FixedClock } from './support/fixed-clock.js';
import { InMemorySlotStore } from './support/in-memory-slot-store.js';
import { TEST_SETTINGS } from './support/scheduling-config.js';

const CALLERS: Record<string, Caller> = {
  'dr-12': doctor(2, 12),
  'dr-13': doctor(3, 13),
  'ops-admin': admin(1),
  'patient-70': patient(7, 70),
  'patient-71': patient(8, 71),
};

/** Stands in for bearer verification: the caller is named by a test header. */
@Injectable()
class HeaderCallerGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<{
      headers: Record<string, string | string[] | undefined>;
      user?: Caller;
    }>();
    const name = req.headers['x-test-caller'];
    const caller = typeof name === 'string' ? CALLERS[name] : undefined;
    if (!caller) {
      throw new UnauthorizedException();
    }
    req.user = caller;
    return true;
  }
}

describe('Scheduling API (e2e)', () => {
  let app: NestFastifyApplication;
  let store: InMemorySlotStore;

  beforeEach(async () => {
    store = new InMemorySlotStore();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ ...TEST_SETTINGS })],
        }),
        CommonModule,
        SlotModule,
        AvailabilityModule,
        AppointmentModule,
      ],
      controllers: [AppController],
    })
      .overrideProvider(SLOT_STORE)
      .useValue(store)
      .overrideProvider(Clock)
      .useValue(new FixedClock(new Date(2025, 3, 10, 8, 0)))
      .overrideGuard(JwtAuthGuard)
      .useClass(HeaderCallerGuard)
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter(),
    );
    app.setGlobalPrefix('api');
    app.useGlobalFilters(new SchedulingExceptionFilter());
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
  });

  const seedDay = () => {
    for (const [startTime, endTime] of [
      ['10:00', '10:20'],
      ['10:20', '10:40'],
      ['10:40', '11:00'],
    ]) {
      store.seedSlot({ doctorId: 12, date: '2025-04-11', startTime, endTime });
    }
  };

  it('GET /api/health', async () => {
    const response = await request(app.getHttpServer()).get('/api/health');

    expect(response.status).toBe(HttpStatus.OK);
    expect(response.body).toEqual({ status: 'ok' });
  });

  it('rejects requests without a caller', async () => {
    const response = await request(app.getHttpServer()).get('/api/appointments');

    expect(response.status).toBe(HttpStatus.UNAUTHORIZED);
    expect(response.body.error).toBe('unauthorized');
  });

  describe('POST /api/slots/generate', () => {
    it('generates a day of slots for the calling doctor', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/slots/generate')
        .set('x-test-caller', 'dr-12')
        .send({
          start_date: '2025-04-11',
          end_date: '2025-04-11',
          start_time: '10:00',
          end_time: '13:00',
          duration_minutes: 20,
        });

      expect(response.status).toBe(HttpStatus.CREATED);
      expect(response.body).toEqual({ created_count: 9, skipped_count: 0 });

      const day = await request(app.getHttpServer())
        .get('/api/availability/doctors/12')
        .query({ date: '2025-04-11' })
        .set('x-test-caller', 'patient-70');

      expect(day.status).toBe(HttpStatus.OK);
      expect(day.body.slots).toHaveLength(9);
      expect(day.body.slots[0]).toEqual({
        id: 1,
        doctor_id: 12,
        date: '2025-04-11',
        start_time: '10:00',
        end_time: '10:20',
        duration_minutes: 20,
        delivery_mode: 'physical',
        state: 'free',
      });
    });

    it('forbids patients', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/slots/generate')
        .set('x-test-caller', 'patient-70')
        .send({
          start_date: '2025-04-11',
          end_date: '2025-04-11',
          start_time: '10:00',
          end_time: '13:00',
          duration_minutes: 20,
        });

      expect(response.status).toBe(HttpStatus.FORBIDDEN);
      expect(response.body.error).toBe('forbidden');
      expect(store.slots.size).toBe(0);
    });

    it('requires admins to name the doctor', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/slots/generate')
        .set('x-test-caller', 'ops-admin')
        .send({
          start_date: '2025-04-11',
          end_date: '2025-04-11',
          start_time: '10:00',
          end_time: '11:00',
          duration_minutes: 30,
        });

      expect(response.status).toBe(HttpStatus.BAD_REQUEST);
      expect(response.body.error).toBe('validation_error');
    });
  });

  describe('POST /api/appointments', () => {
    it('books a slot exactly once when two patients race for it', async () => {
      seedDay();

      const [first, second] = await Promise.all([
        request(app.getHttpServer())
          .post('/api/appointments')
          .set('x-test-caller', 'patient-70')
          .send({ slot_id: 1 }),
        request(app.getHttpServer())
          .post('/api/appointments')
          .set('x-test-caller', 'patient-71')
          .send({ slot_id: 1 }),
      ]);

      const statuses = [first.status, second.status].sort();
      expect(statuses).toEqual([HttpStatus.CREATED, HttpStatus.CONFLICT]);

      const loser = first.status === HttpStatus.CONFLICT ? first : second;
      expect(loser.body.error).toBe('slot_unavailable');
      expect(store.liveAppointmentsFor(1)).toHaveLength(1);
      expect(store.slot(1)?.state).toBe('booked');
    });

    it('rejects a malformed body', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('x-test-caller', 'patient-70')
        .send({ slot_id: 'first' });

      expect(response.status).toBe(HttpStatus.BAD_REQUEST);
      expect(response.body.error).toBe('validation_error');
    });

    it('lets only the creator cancel and frees the slot', async () => {
      seedDay();
      const booked = await request(app.getHttpServer())
        .post('/api/appointments')
        .set('x-test-caller', 'patient-70')
        .send({ slot_id: 2 });
      expect(booked.status).toBe(HttpStatus.CREATED);
      expect(booked.body).toMatchObject({
        slot_id: 2,
        doctor_id: 12,
        patient_id: 70,
        state: 'confirmed',
        created_by: 7,
      });

      const stranger = await request(app.getHttpServer())
        .delete(`/api/appointments/${booked.body.id}`)
        .set('x-test-caller', 'patient-71');
      expect(stranger.status).toBe(HttpStatus.FORBIDDEN);
      expect(stranger.body.error).toBe('forbidden');

      const owner = await request(app.getHttpServer())
        .delete(`/api/appointments/${booked.body.id}`)
        .set('x-test-caller', 'patient-70');
      expect(owner.status).toBe(HttpStatus.OK);
      expect(owner.body.state).toBe('cancelled');
      expect(store.slot(2)?.state).toBe('free');
    });

    it('returns not_found for an unknown appointment', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/appointments/999')
        .set('x-test-caller', 'patient-70');

      expect(response.status).toBe(HttpStatus.NOT_FOUND);
      expect(response.body).toEqual({
        statusCode: 404,
        error: 'not_found',
        message: 'Appointment 999 not found',
      });
    });
  });

  describe('POST /api/slots/cancel', () => {
    it('cancels a slot once and ignores repeats', async () => {
      seedDay();

      const first = await request(app.getHttpServer())
        .post('/api/slots/cancel')
        .set('x-test-caller', 'dr-12')
        .send({ slot_ids: [3] });
      const again = await request(app.getHttpServer())
        .post('/api/slots/cancel')
        .set('x-test-caller', 'dr-12')
        .send({ slot_ids: [3] });

      expect(first.status).toBe(HttpStatus.OK);
      expect(first.body).toEqual({ cancelled_count: 1 });
      expect(again.body).toEqual({ cancelled_count: 0 });
    });

    it("leaves another doctor's slots alone", async () => {
      seedDay();

      const response = await request(app.getHttpServer())
        .post('/api/slots/cancel')
        .set('x-test-caller', 'dr-13')
        .send({ slot_ids: [1, 2] });

      expect(response.body).toEqual({ cancelled_count: 0 });
      expect(store.slot(1)?.state).toBe('free');
    });
  });
});
